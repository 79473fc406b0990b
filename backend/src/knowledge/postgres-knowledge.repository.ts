import { Logger } from '@nestjs/common';
import type { PoolClient, QueryResultRow } from 'pg';
import { DatabaseService, toStoreError } from '../database/index.js';
import { DimensionMismatchError, StaleVersionError } from '../common/errors.js';
import type { KnowledgeRepository } from './knowledge.repository.js';
import type {
  DocumentCommit,
  DocumentSourceType,
  HybridHits,
  IndexEntry,
  KnowledgeDocument,
  ScoredChunk,
  StoredChunk,
} from './knowledge.types.js';
import { queryTerms } from './keyword-index.js';
import { toVectorLiteral } from './vector-math.js';

interface DocumentRow {
  id: string;
  source_type: DocumentSourceType;
  source_key: string;
  display_name: string;
  fingerprint: string;
  version: number;
  chunk_count: number;
  created_at: string | Date;
  last_indexed_at: string | Date;
}

interface ChunkRow {
  chunk_id: string;
  document_id: string;
  version: number;
  ordinal: number;
  start_offset: number;
  end_offset: number;
  content: string;
  source_name: string;
  score: number | string;
}

interface VersionRow {
  version: number | null;
}

const CHUNK_COLUMNS = `
  e.chunk_id,
  e.document_id,
  e.version,
  e.ordinal,
  e.start_offset,
  e.end_offset,
  e.content,
  e.source_name`;

const VECTOR_SEARCH_SQL = `
  SELECT
    ${CHUNK_COLUMNS},
    1 - (e.embedding <=> $1::vector) AS score
  FROM knowledge_entries e
  ORDER BY score DESC, e.ordinal ASC, e.document_id ASC
  LIMIT $2
`;

// Same formula as scoreKeywordOverlap: summed term frequencies of the
// distinct query terms over the chunk's token count.
const KEYWORD_SEARCH_SQL = `
  SELECT
    ${CHUNK_COLUMNS},
    (
      SELECT COALESCE(SUM((e.term_freqs ->> term)::double precision), 0)
      FROM unnest($1::text[]) AS term
    ) / GREATEST(e.token_count, 1) AS score
  FROM knowledge_entries e
  WHERE e.keywords && $1::text[]
  ORDER BY score DESC, e.ordinal ASC, e.document_id ASC
  LIMIT $2
`;

// both channels of a hybrid query read the same snapshot
const SNAPSHOT_BEGIN = 'BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY';

/**
 * pgvector-backed store. Entry replacement and the document record's
 * compare-and-swap run in one transaction under a per-document advisory
 * lock, so concurrent readers see either the previous version or the new
 * one.
 */
export class PostgresKnowledgeRepository implements KnowledgeRepository {
  private readonly logger = new Logger(PostgresKnowledgeRepository.name);

  constructor(
    private readonly database: DatabaseService,
    public readonly dimensions: number,
  ) {}

  async getDocument(
    documentId: string,
  ): Promise<KnowledgeDocument | undefined> {
    const rows = await this.query<DocumentRow>(
      'SELECT * FROM knowledge_documents WHERE id = $1',
      [documentId],
    );
    const row = rows[0];
    return row ? this.mapDocument(row) : undefined;
  }

  async listDocuments(): Promise<KnowledgeDocument[]> {
    const rows = await this.query<DocumentRow>(
      `
      SELECT *
      FROM knowledge_documents
      ORDER BY last_indexed_at DESC, id ASC
      `,
    );
    return rows.map((row) => this.mapDocument(row));
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

    await this.transaction(async (client) => {
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
        documentId,
      ]);

      const { rows } = await client.query<VersionRow>(
        `
        SELECT GREATEST(
          (SELECT MAX(version) FROM knowledge_entries WHERE document_id = $1),
          (SELECT version FROM knowledge_documents WHERE id = $1)
        ) AS version
        `,
        [documentId],
      );
      const newest = rows[0]?.version ?? 0;
      if (newest > version) {
        throw new StaleVersionError(documentId, version, newest);
      }

      await client.query(
        'DELETE FROM knowledge_entries WHERE document_id = $1 AND version <= $2',
        [documentId, version],
      );

      for (const entry of entries) {
        await client.query(
          `INSERT INTO knowledge_entries (
            chunk_id,
            document_id,
            version,
            ordinal,
            start_offset,
            end_offset,
            content,
            source_name,
            embedding,
            keywords,
            term_freqs,
            token_count
          )
          VALUES (
            $1, $2, $3, $4, $5, $6, $7, $8,
            $9::vector,
            $10::text[],
            $11::jsonb,
            $12
          )`,
          [
            entry.chunkId,
            documentId,
            version,
            entry.ordinal,
            entry.startOffset,
            entry.endOffset,
            entry.text,
            entry.sourceName,
            toVectorLiteral(entry.embedding),
            Object.keys(entry.termFrequencies),
            JSON.stringify(entry.termFrequencies),
            entry.tokenCount,
          ],
        );
      }

      if (commit) {
        await this.writeDocument(client, commit.document, commit.expectedVersion);
      }
    });

    this.logger.debug(
      `Indexed ${entries.length} entries for ${documentId} v${version}`,
    );
  }

  async delete(documentId: string): Promise<boolean> {
    return this.transaction(async (client) => {
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
        documentId,
      ]);
      const entries = await client.query(
        'DELETE FROM knowledge_entries WHERE document_id = $1',
        [documentId],
      );
      const documents = await client.query(
        'DELETE FROM knowledge_documents WHERE id = $1',
        [documentId],
      );
      return (entries.rowCount ?? 0) > 0 || (documents.rowCount ?? 0) > 0;
    });
  }

  async vectorSearch(queryVector: number[], k: number): Promise<ScoredChunk[]> {
    this.assertQueryDimensions(queryVector);
    const rows = await this.query<ChunkRow>(VECTOR_SEARCH_SQL, [
      toVectorLiteral(queryVector),
      k,
    ]);
    return rows.map((row) => this.mapScoredChunk(row));
  }

  async keywordSearch(queryText: string, k: number): Promise<ScoredChunk[]> {
    const terms = queryTerms(queryText);
    if (terms.length === 0) {
      return [];
    }
    const rows = await this.query<ChunkRow>(KEYWORD_SEARCH_SQL, [terms, k]);
    return rows.map((row) => this.mapScoredChunk(row));
  }

  async hybridSearch(
    queryVector: number[],
    queryText: string,
    k: number,
  ): Promise<HybridHits> {
    this.assertQueryDimensions(queryVector);
    const terms = queryTerms(queryText);

    return this.transaction(async (client) => {
      const vector = await client.query<ChunkRow>(VECTOR_SEARCH_SQL, [
        toVectorLiteral(queryVector),
        k,
      ]);
      const keyword =
        terms.length === 0
          ? []
          : (await client.query<ChunkRow>(KEYWORD_SEARCH_SQL, [terms, k])).rows;
      return {
        vector: vector.rows.map((row) => this.mapScoredChunk(row)),
        keyword: keyword.map((row) => this.mapScoredChunk(row)),
      };
    }, SNAPSHOT_BEGIN);
  }

  async ping(): Promise<void> {
    await this.database.ping();
  }

  private async query<T extends QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<T[]> {
    try {
      const { rows } = await this.database.getPool().query<T>(text, params);
      return rows;
    } catch (error) {
      throw toStoreError(error);
    }
  }

  private async transaction<T>(
    work: (client: PoolClient) => Promise<T>,
    begin = 'BEGIN',
  ): Promise<T> {
    const client = await this.database.getClient();
    try {
      await client.query(begin);
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.logger.warn(
          `Rollback failed: ${
            rollbackError instanceof Error
              ? rollbackError.message
              : String(rollbackError)
          }`,
        );
      }
      throw toStoreError(error);
    } finally {
      client.release();
    }
  }

  /**
   * Inserts the first version (`expectedVersion` 0) or moves the record from
   * `expectedVersion` to `document.version`; `StaleVersionError` when another
   * writer got there first.
   */
  private async writeDocument(
    client: PoolClient,
    document: KnowledgeDocument,
    expectedVersion: number,
  ): Promise<void> {
    const params = [
      document.id,
      document.sourceType,
      document.sourceKey,
      document.displayName,
      document.fingerprint,
      document.version,
      document.chunkCount,
      document.createdAt,
      document.lastIndexedAt,
    ];

    const { rows } =
      expectedVersion === 0
        ? await client.query<{ id: string }>(
            `INSERT INTO knowledge_documents (
              id,
              source_type,
              source_key,
              display_name,
              fingerprint,
              version,
              chunk_count,
              created_at,
              last_indexed_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
            ON CONFLICT (id) DO NOTHING
            RETURNING id`,
            params,
          )
        : await client.query<{ id: string }>(
            `UPDATE knowledge_documents
            SET
              source_type = $2,
              source_key = $3,
              display_name = $4,
              fingerprint = $5,
              version = $6,
              chunk_count = $7,
              last_indexed_at = $9
            WHERE id = $1 AND version = $10
            RETURNING id`,
            [...params, expectedVersion],
          );

    if (rows.length === 0) {
      const current = await client.query<VersionRow>(
        'SELECT version FROM knowledge_documents WHERE id = $1',
        [document.id],
      );
      throw new StaleVersionError(
        document.id,
        document.version,
        current.rows[0]?.version ?? 0,
      );
    }
  }

  private assertQueryDimensions(queryVector: number[]): void {
    if (queryVector.length !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, queryVector.length);
    }
  }

  private mapDocument(row: DocumentRow): KnowledgeDocument {
    return {
      id: row.id,
      sourceType: row.source_type,
      sourceKey: row.source_key,
      displayName: row.display_name,
      fingerprint: row.fingerprint,
      version: row.version,
      chunkCount: row.chunk_count,
      createdAt: new Date(row.created_at),
      lastIndexedAt: new Date(row.last_indexed_at),
    };
  }

  private mapScoredChunk(row: ChunkRow): ScoredChunk {
    const chunk: StoredChunk = {
      chunkId: row.chunk_id,
      documentId: row.document_id,
      version: row.version,
      ordinal: row.ordinal,
      startOffset: row.start_offset,
      endOffset: row.end_offset,
      text: row.content,
      sourceName: row.source_name,
    };
    return {
      chunk,
      score: typeof row.score === 'number' ? row.score : Number(row.score),
    };
  }
}
