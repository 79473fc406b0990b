import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, RetrievalConfig } from '../config/index.js';
import { EmbeddingGatewayService } from '../embedding/index.js';
import {
  KNOWLEDGE_REPOSITORY_TOKEN,
  type KnowledgeRepository,
} from '../knowledge/index.js';
import { throwIfAborted } from '../common/abort.js';
import { InvalidQueryError } from '../common/errors.js';
import { fuseResults } from './fusion.js';
import type {
  FusionWeights,
  RetrievalResult,
  RetrieveOptions,
} from './retrieval.types.js';

/**
 * Hybrid retriever: a vector and a keyword search over one snapshot of the
 * index, each over-fetched, fused into one ranked list.
 */
@Injectable()
export class RetrievalService {
  private readonly logger = new Logger(RetrievalService.name);
  private readonly settings: RetrievalConfig;

  constructor(
    private readonly embeddingGateway: EmbeddingGatewayService,
    @Inject(KNOWLEDGE_REPOSITORY_TOKEN)
    private readonly repository: KnowledgeRepository,
    configService: ConfigService<AppConfig>,
  ) {
    const settings = configService.get<RetrievalConfig>('retrieval');
    if (!settings) {
      throw new Error('Retrieval configuration is missing');
    }
    this.settings = settings;
  }

  async retrieve(
    query: string,
    options: RetrieveOptions = {},
  ): Promise<RetrievalResult[]> {
    const trimmed = query.trim();
    const k = options.k ?? this.settings.topK;
    const weights: FusionWeights = {
      vectorWeight: options.vectorWeight ?? this.settings.vectorWeight,
      keywordWeight: options.keywordWeight ?? this.settings.keywordWeight,
    };
    this.validate(trimmed, k, weights);

    const { signal } = options;
    throwIfAborted(signal);

    const queryVector = await this.embeddingGateway.embedQuery(trimmed, {
      signal,
    });
    throwIfAborted(signal);

    const candidates = k * this.settings.overfetchFactor;
    const { vector: vectorHits, keyword: keywordHits } =
      await this.repository.hybridSearch(queryVector, trimmed, candidates);
    // a cancelled request drops whatever the searches returned
    throwIfAborted(signal);

    const results = fuseResults(vectorHits, keywordHits, weights, k);

    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(
        `Query "${trimmed.substring(0, 50)}${trimmed.length > 50 ? '...' : ''}": vector=${vectorHits.length} keyword=${keywordHits.length} fused=${results.length}`,
      );
    }
    return results;
  }

  private validate(query: string, k: number, weights: FusionWeights): void {
    if (query.length === 0) {
      throw new InvalidQueryError('query text must not be empty');
    }
    if (!Number.isInteger(k) || k < 1) {
      throw new InvalidQueryError(`k must be a positive integer, got ${k}`);
    }
    if (k > this.settings.maxK) {
      throw new InvalidQueryError(
        `k must not exceed ${this.settings.maxK}, got ${k}`,
      );
    }
    const { vectorWeight, keywordWeight } = weights;
    for (const [name, value] of [
      ['vectorWeight', vectorWeight],
      ['keywordWeight', keywordWeight],
    ] as const) {
      if (!Number.isFinite(value) || value < 0) {
        throw new InvalidQueryError(
          `${name} must be a finite non-negative number, got ${value}`,
        );
      }
    }
    if (vectorWeight + keywordWeight <= 0) {
      throw new InvalidQueryError('weights must have a positive total');
    }
  }
}
