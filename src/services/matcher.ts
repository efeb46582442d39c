import { ClassificationIndex } from './classification-index';
import { MatchResult, UnmatchedVacancy } from '../types/records';
import { preprocess, tokenSetRatioOfTokens, tokenize } from '../utils/similarity';
import { logger } from '../utils/logger';

export const DEFAULT_SIMILARITY_THRESHOLD = 75;

/**
 * Resolves free-text professions to classification ids
 * Every vacancy is scored against every candidate; the first candidate
 * reaching the highest score wins and is accepted at or above the cutoff.
 */
export class ClassificationMatcher {
  constructor(
    private index: ClassificationIndex,
    private threshold: number = DEFAULT_SIMILARITY_THRESHOLD
  ) {}

  /**
   * Best candidate for a single profession, or null below the cutoff
   */
  bestMatch(profession: string | null): { name: string; id: number; score: number } | null {
    if (!profession) return null;
    const tokens = tokenize(preprocess(profession));
    if (tokens.length === 0) return null;

    let bestName: string | null = null;
    let bestScore = -1;

    for (const candidate of this.index.candidates) {
      const cutoff = Math.max(this.threshold, bestScore);
      const score = tokenSetRatioOfTokens(tokens, candidate.tokens, cutoff);
      if (score > bestScore) {
        bestScore = score;
        bestName = candidate.name;
        if (score === 100) break;
      }
    }

    if (bestName === null || bestScore < this.threshold) return null;

    const id = this.index.resolve(bestName);
    if (id === undefined) return null;
    return { name: bestName, id, score: bestScore };
  }

  match(vacancies: readonly UnmatchedVacancy[]): MatchResult[] {
    const startTime = Date.now();
    const results: MatchResult[] = [];

    for (const vacancy of vacancies) {
      const best = this.bestMatch(vacancy.profession);
      if (!best) continue;
      results.push({
        vacancyId: vacancy.id,
        classificationId: best.id,
        classificationName: best.name,
        score: best.score,
      });
    }

    logger.info('Classification matching finished', {
      vacancies: vacancies.length,
      candidates: this.index.size,
      matched: results.length,
      threshold: this.threshold,
      duration: `${Date.now() - startTime}ms`,
    });

    return results;
  }
}
