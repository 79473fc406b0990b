import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService } from '../ai/index.js';
import type { AppConfig, EmbeddingConfig } from '../config/index.js';
import { createDeadline, throwIfAborted } from '../common/abort.js';
import { Semaphore } from '../common/concurrency/index.js';
import {
  EmbeddingMalformedError,
  EmbeddingUnavailableError,
  OperationAbortedError,
  describeError,
} from '../common/errors.js';

export interface EmbedOptions {
  signal?: AbortSignal;
}

export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let index = 0; index < items.length; index += size) {
    batches.push(items.slice(index, index + size));
  }
  return batches;
}

/**
 * Ordered, batched access to the embedding provider. One vector comes back
 * per input text, in input order, every vector `dimensions` long; anything
 * else is reported as `EmbeddingMalformedError`. A single semaphore bounds
 * in-flight provider calls across all callers.
 */
@Injectable()
export class EmbeddingGatewayService {
  private readonly logger = new Logger(EmbeddingGatewayService.name);
  private readonly settings: EmbeddingConfig;
  private readonly limiter: Semaphore;

  constructor(
    private readonly aiService: AIService,
    configService: ConfigService<AppConfig>,
  ) {
    const settings = configService.get<EmbeddingConfig>('embedding');
    if (!settings) {
      throw new Error('Embedding configuration is missing');
    }
    this.settings = settings;
    this.limiter = new Semaphore(settings.maxConcurrency);
  }

  async embed(
    texts: readonly string[],
    options: EmbedOptions = {},
  ): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const batches = toBatches(texts, this.settings.batchSize);
    const results = await Promise.all(
      batches.map((batch) =>
        this.limiter.use(() => this.embedBatch(batch, options.signal)),
      ),
    );

    if (batches.length > 1) {
      this.logger.debug(
        `Embedded ${texts.length} texts in ${batches.length} batches`,
      );
    }
    return results.flat();
  }

  async embedQuery(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embed([text], options);
    if (!vector) {
      throw new EmbeddingMalformedError('provider returned no query vector');
    }
    return vector;
  }

  private async embedBatch(
    batch: string[],
    signal?: AbortSignal,
  ): Promise<number[][]> {
    throwIfAborted(signal);
    const deadline = createDeadline(this.settings.timeoutMs, signal);

    let embeddings: number[][];
    try {
      const result = await this.aiService.embedText({
        inputs: batch,
        dimensions: this.settings.dimensions,
        abortSignal: deadline.signal,
      });
      embeddings = result.embeddings;
    } catch (error) {
      if (signal?.aborted) {
        throw new OperationAbortedError('embedding request aborted by caller');
      }
      if (deadline.timedOut()) {
        throw new EmbeddingUnavailableError(
          `embedding provider timed out after ${this.settings.timeoutMs}ms`,
          { cause: error },
        );
      }
      throw new EmbeddingUnavailableError(
        `embedding provider failed: ${describeError(error)}`,
        { cause: error },
      );
    } finally {
      deadline.dispose();
    }

    this.assertWellFormed(batch, embeddings);
    return embeddings;
  }

  private assertWellFormed(batch: string[], embeddings: number[][]): void {
    if (embeddings.length !== batch.length) {
      throw new EmbeddingMalformedError(
        `expected ${batch.length} embeddings, provider returned ${embeddings.length}`,
      );
    }
    embeddings.forEach((vector, index) => {
      if (vector.length !== this.settings.dimensions) {
        throw new EmbeddingMalformedError(
          `embedding ${index} has ${vector.length} dimensions, expected ${this.settings.dimensions}`,
        );
      }
      if (!vector.every((component) => Number.isFinite(component))) {
        throw new EmbeddingMalformedError(
          `embedding ${index} contains non-finite components`,
        );
      }
    });
  }
}
