export type DocumentSourceType = 'upload' | 'drive';

export interface KnowledgeDocument {
  id: string;
  sourceType: DocumentSourceType;
  /** Upload path or Drive file id the document id was derived from. */
  sourceKey: string;
  displayName: string;
  fingerprint: string;
  version: number;
  chunkCount: number;
  createdAt: Date;
  lastIndexedAt: Date;
}

/** Searchable chunk as returned by the store, without its vector. */
export interface StoredChunk {
  chunkId: string;
  documentId: string;
  version: number;
  ordinal: number;
  startOffset: number;
  endOffset: number;
  text: string;
  sourceName: string;
}

export interface IndexEntry extends StoredChunk {
  embedding: number[];
  termFrequencies: Record<string, number>;
  tokenCount: number;
}

export interface ScoredChunk {
  chunk: StoredChunk;
  score: number;
}

/** Document record written in the same step as its entries. */
export interface DocumentCommit {
  document: KnowledgeDocument;
  /** Version the stored record must be at; 0 when there is none yet. */
  expectedVersion: number;
}

/** Both search channels, read from one snapshot of the index. */
export interface HybridHits {
  vector: ScoredChunk[];
  keyword: ScoredChunk[];
}

export function buildChunkId(
  documentId: string,
  version: number,
  ordinal: number,
): string {
  return `${documentId}:v${version}:${ordinal}`;
}

/**
 * Ranking order shared by every store: score descending, then lower ordinal,
 * then lower document id.
 */
export function compareScoredChunks(a: ScoredChunk, b: ScoredChunk): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  if (a.chunk.ordinal !== b.chunk.ordinal) {
    return a.chunk.ordinal - b.chunk.ordinal;
  }
  if (a.chunk.documentId !== b.chunk.documentId) {
    return a.chunk.documentId < b.chunk.documentId ? -1 : 1;
  }
  return 0;
}
