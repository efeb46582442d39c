import { ClassificationEntry } from '../types/records';
import { preprocess, tokenize } from '../utils/similarity';

export interface ClassificationCandidate {
  name: string;
  tokens: string[];
}

/**
 * In-memory lookup from canonical classification name to its id
 * Built once per run. A name listed twice keeps its first position and
 * resolves to the id seen last.
 */
export class ClassificationIndex {
  private readonly idsByName = new Map<string, number>();
  private readonly candidateList: ClassificationCandidate[] = [];

  constructor(entries: readonly ClassificationEntry[]) {
    for (const entry of entries) {
      if (!this.idsByName.has(entry.name)) {
        this.candidateList.push({ name: entry.name, tokens: tokenize(preprocess(entry.name)) });
      }
      this.idsByName.set(entry.name, entry.id);
    }
  }

  get size(): number {
    return this.candidateList.length;
  }

  /** Candidates in lookup order, tokens precomputed */
  get candidates(): readonly ClassificationCandidate[] {
    return this.candidateList;
  }

  resolve(name: string): number | undefined {
    return this.idsByName.get(name);
  }
}
