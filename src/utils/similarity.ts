/**
 * Token-set similarity on a 0-100 scale.
 *
 * Both strings are split into token sets. Shared tokens form the
 * intersection and the leftovers form two sorted differences. The
 * score is the best indel ratio between the intersection and either
 * side rebuilt as "intersection + difference". A string whose tokens
 * are a subset of the other's scores 100.
 */

const NON_WORD = /[^\p{L}\p{N}]+/gu;

/**
 * Lower-cases and collapses every run of non letter/digit characters into a single space
 */
export function preprocess(value: string): string {
  return value.toLowerCase().replace(NON_WORD, ' ').trim();
}

/**
 * Sorted unique tokens of an already preprocessed string
 */
export function tokenize(processed: string): string[] {
  if (!processed) return [];
  return [...new Set(processed.split(' '))].sort();
}

function codePoints(value: string): number[] {
  return Array.from(value, ch => ch.codePointAt(0) ?? 0);
}

function lcsLength(a: number[], b: number[]): number {
  if (a.length === 0 || b.length === 0) return 0;
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let prev = new Int32Array(inner.length + 1);
  let curr = new Int32Array(inner.length + 1);
  for (let i = 1; i <= outer.length; i++) {
    for (let j = 1; j <= inner.length; j++) {
      curr[j] = outer[i - 1] === inner[j - 1]
        ? prev[j - 1] + 1
        : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[inner.length];
}

/**
 * Normalized indel similarity of two strings, 0-100
 */
export function ratio(a: string, b: string): number {
  const left = codePoints(a);
  const right = codePoints(b);
  const total = left.length + right.length;
  if (total === 0) return 100;
  const distance = total - 2 * lcsLength(left, right);
  return 100 * (1 - distance / total);
}

function normalizedSimilarity(distance: number, total: number): number {
  return total === 0 ? 100 : 100 * (1 - distance / total);
}

/**
 * Token-set ratio between two token lists (each sorted and unique).
 * Evaluation of the expensive difference term is skipped when its upper
 * bound cannot reach `scoreCutoff`; the returned score is then a lower
 * bound that is still below the cutoff.
 */
export function tokenSetRatioOfTokens(
  tokensA: readonly string[],
  tokensB: readonly string[],
  scoreCutoff: number = 0
): number {
  if (tokensA.length === 0 || tokensB.length === 0) return 0;

  const setB = new Set(tokensB);
  const setA = new Set(tokensA);
  const intersection = tokensA.filter(token => setB.has(token));
  const diffAB = tokensA.filter(token => !setB.has(token));
  const diffBA = tokensB.filter(token => !setA.has(token));

  if (intersection.length > 0 && (diffAB.length === 0 || diffBA.length === 0)) {
    return 100;
  }

  const sect = intersection.join(' ');
  const ab = diffAB.join(' ');
  const ba = diffBA.join(' ');
  const sectLen = codePoints(sect).length;
  const abLen = codePoints(ab).length;
  const baLen = codePoints(ba).length;
  const separator = sectLen > 0 ? 1 : 0;
  const sectAbLen = sectLen + separator + abLen;
  const sectBaLen = sectLen + separator + baLen;

  let best = 0;
  if (sectLen > 0) {
    best = Math.max(
      normalizedSimilarity(separator + abLen, sectLen + sectAbLen),
      normalizedSimilarity(separator + baLen, sectLen + sectBaLen)
    );
  }

  // The shared prefix does not change the indel distance, only the length it is normalized by
  const total = sectAbLen + sectBaLen;
  const upperBound = normalizedSimilarity(Math.abs(abLen - baLen), total);
  if (upperBound <= best || upperBound < scoreCutoff) {
    return best;
  }

  const distance = abLen + baLen - 2 * lcsLength(codePoints(ab), codePoints(ba));
  return Math.max(best, normalizedSimilarity(distance, total));
}

/**
 * Token-set ratio of two raw strings
 */
export function tokenSetRatio(a: string, b: string): number {
  return tokenSetRatioOfTokens(tokenize(preprocess(a)), tokenize(preprocess(b)));
}
