import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, IngestionConfig } from '../config/index.js';
import { ChunkingService, type TextChunk } from '../chunking/index.js';
import { EmbeddingGatewayService } from '../embedding/index.js';
import { TextExtractionService } from '../extraction/index.js';
import {
  KNOWLEDGE_REPOSITORY_TOKEN,
  buildChunkId,
  buildTermProfile,
  type IndexEntry,
  type KnowledgeDocument,
  type KnowledgeRepository,
} from '../knowledge/index.js';
import { KeyedMutex } from '../common/concurrency/index.js';
import {
  DocumentNotFoundError,
  IngestionFailedError,
  describeError,
  isRetryable,
} from '../common/errors.js';
import { retryWithBackoff } from '../common/retry.js';
import { ChangeDetectorService } from './change-detector.service.js';
import { computeFingerprint, deriveDocumentId } from './fingerprint.js';
import type {
  IngestContentInput,
  IngestDocumentInput,
  IngestionOutcome,
} from './ingestion.types.js';

/**
 * Fingerprint → change check → chunk → embed → upsert, one document at a time
 * per id. The new entries and the record's move to the new version are one
 * store operation; any failure leaves the document searchable at its last
 * good version so a retry reprocesses it whole.
 */
@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);
  private readonly locks = new KeyedMutex();
  private readonly settings: IngestionConfig;

  constructor(
    private readonly chunking: ChunkingService,
    private readonly embeddingGateway: EmbeddingGatewayService,
    private readonly changeDetector: ChangeDetectorService,
    private readonly extraction: TextExtractionService,
    @Inject(KNOWLEDGE_REPOSITORY_TOKEN)
    private readonly repository: KnowledgeRepository,
    configService: ConfigService<AppConfig>,
  ) {
    const settings = configService.get<IngestionConfig>('ingestion');
    if (!settings) {
      throw new Error('Ingestion configuration is missing');
    }
    this.settings = settings;
  }

  resolveDocumentId(
    input: Pick<IngestDocumentInput, 'sourceType' | 'sourceKey' | 'documentId'>,
  ): string {
    return input.documentId ?? deriveDocumentId(input.sourceType, input.sourceKey);
  }

  async ingest(input: IngestDocumentInput): Promise<IngestionOutcome> {
    const documentId = this.resolveDocumentId(input);
    return this.locks.runExclusive(documentId, () =>
      this.ingestExclusive(documentId, input),
    );
  }

  async ingestContent(input: IngestContentInput): Promise<IngestionOutcome> {
    const { content, mimeType, ...rest } = input;
    const text = await this.extraction.extract(content, mimeType);
    return this.ingest({ ...rest, text });
  }

  async remove(documentId: string): Promise<void> {
    const removed = await this.locks.runExclusive(documentId, () =>
      this.repository.delete(documentId),
    );
    if (!removed) {
      throw new DocumentNotFoundError(documentId);
    }
    this.logger.log(`Removed document ${documentId}`);
  }

  async getDocument(documentId: string): Promise<KnowledgeDocument> {
    const document = await this.repository.getDocument(documentId);
    if (!document) {
      throw new DocumentNotFoundError(documentId);
    }
    return document;
  }

  listDocuments(): Promise<KnowledgeDocument[]> {
    return this.repository.listDocuments();
  }

  private async ingestExclusive(
    documentId: string,
    input: IngestDocumentInput,
  ): Promise<IngestionOutcome> {
    const fingerprint = computeFingerprint(input.text);

    try {
      const { current, reindex } = await this.changeDetector.inspect(
        documentId,
        fingerprint,
      );
      if (current && !reindex) {
        this.logger.log(
          `Skipping ${documentId}: content unchanged at v${current.version}`,
        );
        return {
          status: 'unchanged',
          document: current,
          chunkCount: current.chunkCount,
        };
      }

      const previousVersion = current?.version ?? 0;
      const version = previousVersion + 1;
      const chunks = this.chunking.chunk(input.text);
      const embeddings = await this.embedWithRetry(
        documentId,
        chunks.map((chunk) => chunk.text),
      );
      const entries = chunks.map((chunk, index) =>
        this.buildEntry(documentId, version, input.displayName, chunk, embeddings[index] ?? []),
      );

      const now = new Date();
      const document: KnowledgeDocument = {
        id: documentId,
        sourceType: input.sourceType,
        sourceKey: input.sourceKey,
        displayName: input.displayName,
        fingerprint,
        version,
        chunkCount: entries.length,
        createdAt: current?.createdAt ?? now,
        lastIndexedAt: now,
      };
      await this.repository.upsert(documentId, version, entries, {
        document,
        expectedVersion: previousVersion,
      });

      this.logger.log(
        `Indexed ${documentId} ("${input.displayName}") v${version}: ${entries.length} chunks`,
      );
      return { status: 'indexed', document, chunkCount: entries.length };
    } catch (error) {
      this.logger.error(
        `Ingestion of ${documentId} failed: ${describeError(error)}`,
        error instanceof Error ? error.stack : undefined,
      );
      throw new IngestionFailedError(documentId, error);
    }
  }

  private embedWithRetry(
    documentId: string,
    texts: string[],
  ): Promise<number[][]> {
    return retryWithBackoff(() => this.embeddingGateway.embed(texts), {
      maxAttempts: this.settings.maxAttempts,
      baseDelayMs: this.settings.retryBaseDelayMs,
      shouldRetry: isRetryable,
      onRetry: (error, attempt, delayMs) => {
        this.logger.warn(
          `Embedding ${documentId} failed (attempt ${attempt}/${this.settings.maxAttempts}), retrying in ${delayMs}ms: ${describeError(error)}`,
        );
      },
    });
  }

  private buildEntry(
    documentId: string,
    version: number,
    sourceName: string,
    chunk: TextChunk,
    embedding: number[],
  ): IndexEntry {
    const profile = buildTermProfile(chunk.text);
    return {
      chunkId: buildChunkId(documentId, version, chunk.ordinal),
      documentId,
      version,
      ordinal: chunk.ordinal,
      startOffset: chunk.startOffset,
      endOffset: chunk.endOffset,
      text: chunk.text,
      sourceName,
      embedding,
      termFrequencies: profile.termFrequencies,
      tokenCount: profile.tokenCount,
    };
  }
}
