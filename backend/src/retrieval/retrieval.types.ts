import type { StoredChunk } from '../knowledge/index.js';

export interface FusionWeights {
  vectorWeight: number;
  keywordWeight: number;
}

export interface RetrievalResult {
  chunk: StoredChunk;
  /** Weighted sum of the normalised channel scores. */
  score: number;
  vectorScore: number;
  keywordScore: number;
  normalizedVectorScore: number;
  normalizedKeywordScore: number;
  sourceName: string;
}

export interface RetrieveOptions extends Partial<FusionWeights> {
  k?: number;
  signal?: AbortSignal;
}
