import { describe, it, expect } from 'vitest';
import {
  preprocess,
  ratio,
  tokenSetRatio,
  tokenSetRatioOfTokens,
  tokenize,
} from '../utils/similarity';

describe('preprocess', () => {
  it('lower-cases and replaces punctuation runs with a single space', () => {
    expect(preprocess('  Инженер-программист (1С)!  ')).toBe('инженер программист 1с');
  });

  it('returns an empty string when nothing but punctuation is left', () => {
    expect(preprocess(' -- / ')).toBe('');
  });
});

describe('tokenize', () => {
  it('returns sorted unique tokens', () => {
    expect(tokenize('сети администратор сети')).toEqual(['администратор', 'сети']);
  });

  it('returns no tokens for an empty string', () => {
    expect(tokenize('')).toEqual([]);
  });
});

describe('ratio', () => {
  it('is 100 for identical strings', () => {
    expect(ratio('повар', 'повар')).toBe(100);
  });

  it('is 0 for strings with no characters in common', () => {
    expect(ratio('abc', 'xyz')).toBe(0);
  });

  it('normalizes the indel distance by the combined length', () => {
    // LCS "ab" = 2, indel = 10 - 4 = 6, 1 - 6/10
    expect(ratio('abcde', 'abxyz')).toBeCloseTo(40, 10);
  });
});

describe('tokenSetRatio', () => {
  it('scores 100 when one token set contains the other', () => {
    expect(tokenSetRatio('Системный администратор', 'Системный администратор сети')).toBe(100);
  });

  it('ignores token order and case', () => {
    expect(tokenSetRatio('администратор СИСТЕМНЫЙ', 'Системный администратор')).toBe(100);
  });

  it('uses the intersection ratio when the differences share nothing', () => {
    // sect "abc" vs "abc def": indel 4 over 3 + 7 characters
    expect(tokenSetRatio('abc def', 'abc xyz')).toBeCloseTo(60, 10);
  });

  it('falls back to the plain ratio when no token is shared', () => {
    expect(tokenSetRatio('abcde', 'abxyz')).toBeCloseTo(40, 10);
  });

  it('scores 0 when either side has no tokens', () => {
    expect(tokenSetRatio('', 'Повар')).toBe(0);
    expect(tokenSetRatio('Повар', '!!!')).toBe(0);
  });

  it('is symmetric', () => {
    const a = 'Водитель погрузчика';
    const b = 'Водитель автомобиля';
    expect(tokenSetRatio(a, b)).toBeCloseTo(tokenSetRatio(b, a), 10);
  });
});

describe('tokenSetRatioOfTokens with a score cutoff', () => {
  it('returns the exact score when the cutoff is reachable', () => {
    expect(tokenSetRatioOfTokens(['abcde'], ['abxyz'], 30)).toBeCloseTo(40, 10);
  });

  it('returns a value below the cutoff when the cutoff cannot be reached', () => {
    // Length bound for "a" vs "abcdefghij" is 100 * (1 - 9/11) ≈ 18.2
    const score = tokenSetRatioOfTokens(['a'], ['abcdefghij'], 75);
    expect(score).toBeLessThan(75);
  });
});
