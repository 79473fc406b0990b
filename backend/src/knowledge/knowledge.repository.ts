import type {
  DocumentCommit,
  HybridHits,
  IndexEntry,
  KnowledgeDocument,
  ScoredChunk,
} from './knowledge.types.js';

/**
 * Vector index store plus the document records that say which version of
 * each document is current. Implementations must make `upsert` and `delete`
 * atomic with respect to the searches: a search sees a document's old entry
 * set or its new one, never both.
 */
export interface KnowledgeRepository {
  readonly dimensions: number;

  getDocument(documentId: string): Promise<KnowledgeDocument | undefined>;
  listDocuments(): Promise<KnowledgeDocument[]>;

  /**
   * Replaces every entry of `documentId` at `version` or older with
   * `entries`. Throws `StaleVersionError` when newer entries, or a newer
   * committed document, already exist.
   *
   * With `commit`, the document record is compare-and-swapped in the same
   * atomic step: the entries and the record both land, or neither does.
   */
  upsert(
    documentId: string,
    version: number,
    entries: IndexEntry[],
    commit?: DocumentCommit,
  ): Promise<void>;

  /** Removes the entries and the record; false when neither existed. */
  delete(documentId: string): Promise<boolean>;

  vectorSearch(queryVector: number[], k: number): Promise<ScoredChunk[]>;
  keywordSearch(queryText: string, k: number): Promise<ScoredChunk[]>;

  /**
   * Runs `vectorSearch` and `keywordSearch` against one snapshot, so a
   * concurrent reindex is seen by both channels or by neither.
   */
  hybridSearch(
    queryVector: number[],
    queryText: string,
    k: number,
  ): Promise<HybridHits>;

  ping(): Promise<void>;
}

export const KNOWLEDGE_REPOSITORY_TOKEN = Symbol('KNOWLEDGE_REPOSITORY');
