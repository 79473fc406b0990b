import { describe, expect, it } from '@jest/globals';

import type { ScoredChunk, StoredChunk } from '../knowledge/index.js';
import { fuseResults, normalizeScore } from './fusion.js';

const chunk = (chunkId: string): StoredChunk => ({
  chunkId,
  documentId: chunkId.split(':')[0] ?? chunkId,
  version: 1,
  ordinal: 0,
  startOffset: 0,
  endOffset: 10,
  text: `text of ${chunkId}`,
  sourceName: `${chunkId}.md`,
});

const hit = (chunkId: string, score: number): ScoredChunk => ({
  chunk: chunk(chunkId),
  score,
});

describe('normalizeScore', () => {
  it('divides by the best score', () => {
    expect(normalizeScore(0.4, 0.8)).toBe(0.5);
  });

  it('clamps negative scores to zero', () => {
    expect(normalizeScore(-0.2, 0.8)).toBe(0);
  });

  it('returns zero when the best score is not positive', () => {
    expect(normalizeScore(-0.1, -0.1)).toBe(0);
    expect(normalizeScore(0, 0)).toBe(0);
  });
});

describe('fuseResults', () => {
  it('scores a vector-only and a keyword-only match by their weights', () => {
    const results = fuseResults(
      [hit('vec:v1:0', 0.82)],
      [hit('kw:v1:0', 0.25)],
      { vectorWeight: 0.7, keywordWeight: 0.3 },
      3,
    );

    expect(results.map((result) => [result.chunk.chunkId, result.score])).toEqual([
      ['vec:v1:0', 0.7],
      ['kw:v1:0', 0.3],
    ]);
    expect(results[0]).toMatchObject({
      vectorScore: 0.82,
      keywordScore: 0,
      normalizedVectorScore: 1,
      normalizedKeywordScore: 0,
      sourceName: 'vec:v1:0.md',
    });
  });

  it('gives equal fused scores to single-channel matches with equal weights', () => {
    const results = fuseResults(
      [hit('b:v1:0', 0.6)],
      [hit('a:v1:0', 0.2)],
      { vectorWeight: 0.5, keywordWeight: 0.5 },
      5,
    );

    expect(results[0]?.score).toBe(results[1]?.score);
    // ties fall back to chunk id order
    expect(results.map((result) => result.chunk.chunkId)).toEqual([
      'a:v1:0',
      'b:v1:0',
    ]);
  });

  it('merges a chunk found by both channels', () => {
    const results = fuseResults(
      [hit('doc:v1:0', 0.9), hit('doc:v1:1', 0.45)],
      [hit('doc:v1:0', 0.1)],
      { vectorWeight: 0.7, keywordWeight: 0.3 },
      5,
    );

    expect(results).toHaveLength(2);
    expect(results[0]?.chunk.chunkId).toBe('doc:v1:0');
    expect(results[0]?.score).toBeCloseTo(1, 10);
    expect(results[1]?.score).toBeCloseTo(0.35, 10);
  });

  it('ignores negative vector scores', () => {
    const results = fuseResults(
      [hit('doc:v1:0', -0.3)],
      [],
      { vectorWeight: 1, keywordWeight: 1 },
      5,
    );

    expect(results[0]?.score).toBe(0);
  });

  it('truncates to k', () => {
    const vectorHits = [0.9, 0.8, 0.7, 0.6].map((score, index) =>
      hit(`doc:v1:${index}`, score),
    );

    const results = fuseResults(
      vectorHits,
      [],
      { vectorWeight: 1, keywordWeight: 0 },
      2,
    );

    expect(results.map((result) => result.chunk.chunkId)).toEqual([
      'doc:v1:0',
      'doc:v1:1',
    ]);
  });

  it('returns nothing when both channels are empty', () => {
    expect(fuseResults([], [], { vectorWeight: 1, keywordWeight: 1 }, 5)).toEqual(
      [],
    );
  });
});
