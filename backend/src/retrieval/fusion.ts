import type { ScoredChunk } from '../knowledge/index.js';
import type { FusionWeights, RetrievalResult } from './retrieval.types.js';

function bestScore(hits: readonly ScoredChunk[]): number {
  return hits.reduce((best, hit) => Math.max(best, hit.score), 0);
}

/**
 * Scales a channel into [0, 1] by its own best score. Negative scores (a
 * cosine similarity can be negative) count as 0, and a channel whose best
 * score is not positive contributes nothing.
 */
export function normalizeScore(score: number, best: number): number {
  if (best <= 0) {
    return 0;
  }
  return Math.max(0, score) / best;
}

/**
 * Linear fusion of the vector and keyword candidate lists. Chunks found by
 * both channels appear once; a missing channel scores 0. Weights are used as
 * given, with no normalisation to a total of 1.
 */
export function fuseResults(
  vectorHits: readonly ScoredChunk[],
  keywordHits: readonly ScoredChunk[],
  weights: FusionWeights,
  k: number,
): RetrievalResult[] {
  const vectorBest = bestScore(vectorHits);
  const keywordBest = bestScore(keywordHits);
  const merged = new Map<string, RetrievalResult>();

  const resultFor = (hit: ScoredChunk): RetrievalResult => {
    const existing = merged.get(hit.chunk.chunkId);
    if (existing) {
      return existing;
    }
    const created: RetrievalResult = {
      chunk: hit.chunk,
      score: 0,
      vectorScore: 0,
      keywordScore: 0,
      normalizedVectorScore: 0,
      normalizedKeywordScore: 0,
      sourceName: hit.chunk.sourceName,
    };
    merged.set(hit.chunk.chunkId, created);
    return created;
  };

  for (const hit of vectorHits) {
    const result = resultFor(hit);
    result.vectorScore = hit.score;
    result.normalizedVectorScore = normalizeScore(hit.score, vectorBest);
  }
  for (const hit of keywordHits) {
    const result = resultFor(hit);
    result.keywordScore = hit.score;
    result.normalizedKeywordScore = normalizeScore(hit.score, keywordBest);
  }

  const fused = Array.from(merged.values());
  for (const result of fused) {
    result.score =
      weights.vectorWeight * result.normalizedVectorScore +
      weights.keywordWeight * result.normalizedKeywordScore;
  }

  return fused
    .sort((a, b) => {
      if (b.score !== a.score) {
        return b.score - a.score;
      }
      if (a.chunk.chunkId === b.chunk.chunkId) {
        return 0;
      }
      return a.chunk.chunkId < b.chunk.chunkId ? -1 : 1;
    })
    .slice(0, k);
}
