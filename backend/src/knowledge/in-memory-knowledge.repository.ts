import { Logger } from '@nestjs/common';
import { DimensionMismatchError, StaleVersionError } from '../common/errors.js';
import type { KnowledgeRepository } from './knowledge.repository.js';
import {
  compareScoredChunks,
  type DocumentCommit,
  type HybridHits,
  type IndexEntry,
  type KnowledgeDocument,
  type ScoredChunk,
  type StoredChunk,
} from './knowledge.types.js';
import { queryTerms, scoreKeywordOverlap } from './keyword-index.js';
import { cosineSimilarity } from './vector-math.js';

interface EntrySet {
  version: number;
  entries: readonly IndexEntry[];
}

function toStoredChunk(entry: IndexEntry): StoredChunk {
  return {
    chunkId: entry.chunkId,
    documentId: entry.documentId,
    version: entry.version,
    ordinal: entry.ordinal,
    startOffset: entry.startOffset,
    endOffset: entry.endOffset,
    text: entry.text,
    sourceName: entry.sourceName,
  };
}

/**
 * Process-local store. A document's entry set and record are swapped in one
 * synchronous step, and every search reads one synchronous snapshot, which
 * gives the same all-or-nothing view the Postgres store gets from its
 * transactions. Nothing survives a restart.
 */
export class InMemoryKnowledgeRepository implements KnowledgeRepository {
  private readonly logger = new Logger(InMemoryKnowledgeRepository.name);
  private readonly documents = new Map<string, KnowledgeDocument>();
  private readonly entrySets = new Map<string, EntrySet>();

  constructor(public readonly dimensions: number) {}

  async getDocument(
    documentId: string,
  ): Promise<KnowledgeDocument | undefined> {
    const document = this.documents.get(documentId);
    return document ? { ...document } : undefined;
  }

  async listDocuments(): Promise<KnowledgeDocument[]> {
    return Array.from(this.documents.values())
      .map((document) => ({ ...document }))
      .sort(
        (a, b) => b.lastIndexedAt.getTime() - a.lastIndexedAt.getTime(),
      );
  }

  async upsert(
    documentId: string,
    version: number,
    entries: IndexEntry[],
    commit?: DocumentCommit,
  ): Promise<void> {
    for (const entry of entries) {
      if (entry.embedding.length !== this.dimensions) {
        throw new DimensionMismatchError(
          this.dimensions,
          entry.embedding.length,
        );
      }
    }

    const current = this.entrySets.get(documentId);
    const committed = this.documents.get(documentId)?.version ?? 0;
    const newest = Math.max(current?.version ?? 0, committed);
    if (newest > version) {
      throw new StaleVersionError(documentId, version, newest);
    }
    if (commit) {
      this.assertCommittable(commit.document, commit.expectedVersion);
    }

    this.entrySets.set(documentId, {
      version,
      entries: entries.map((entry) => ({ ...entry })),
    });
    if (commit) {
      this.documents.set(documentId, { ...commit.document });
    }
    this.logger.debug(
      `Indexed ${entries.length} entries for ${documentId} v${version}`,
    );
  }

  async delete(documentId: string): Promise<boolean> {
    const hadEntries = this.entrySets.delete(documentId);
    const hadDocument = this.documents.delete(documentId);
    return hadEntries || hadDocument;
  }

  async vectorSearch(queryVector: number[], k: number): Promise<ScoredChunk[]> {
    return this.scoreVector(this.snapshot(), queryVector, k);
  }

  async keywordSearch(queryText: string, k: number): Promise<ScoredChunk[]> {
    return this.scoreKeywords(this.snapshot(), queryText, k);
  }

  async hybridSearch(
    queryVector: number[],
    queryText: string,
    k: number,
  ): Promise<HybridHits> {
    const entries = this.snapshot();
    return {
      vector: this.scoreVector(entries, queryVector, k),
      keyword: this.scoreKeywords(entries, queryText, k),
    };
  }

  async ping(): Promise<void> {
    return;
  }

  private assertCommittable(
    document: KnowledgeDocument,
    expectedVersion: number,
  ): void {
    const current = this.documents.get(document.id)?.version ?? 0;
    if (current !== expectedVersion) {
      throw new StaleVersionError(document.id, document.version, current);
    }
  }

  private scoreVector(
    entries: readonly IndexEntry[],
    queryVector: number[],
    k: number,
  ): ScoredChunk[] {
    if (queryVector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, queryVector.length);
    }

    const scored: ScoredChunk[] = [];
    for (const entry of entries) {
      scored.push({
        chunk: toStoredChunk(entry),
        score: cosineSimilarity(queryVector, entry.embedding),
      });
    }
    return scored.sort(compareScoredChunks).slice(0, k);
  }

  private scoreKeywords(
    entries: readonly IndexEntry[],
    queryText: string,
    k: number,
  ): ScoredChunk[] {
    const terms = queryTerms(queryText);
    if (terms.length === 0) {
      return [];
    }

    const scored: ScoredChunk[] = [];
    for (const entry of entries) {
      const score = scoreKeywordOverlap(terms, entry);
      if (score > 0) {
        scored.push({ chunk: toStoredChunk(entry), score });
      }
    }
    return scored.sort(compareScoredChunks).slice(0, k);
  }

  private snapshot(): IndexEntry[] {
    const entries: IndexEntry[] = [];
    for (const set of this.entrySets.values()) {
      entries.push(...set.entries);
    }
    return entries;
  }
}
