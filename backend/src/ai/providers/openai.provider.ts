import { Logger } from '@nestjs/common';
import { createOpenAI } from '@ai-sdk/openai';
import { embedMany, streamText as aiStreamText } from 'ai';
import type { AiConfig } from '../../config/index.js';
import type {
  EmbedTextOptions,
  EmbedTextResult,
  StreamTextOptions,
} from '../ai.types.js';
import type { AiProvider } from './ai-provider.js';

type StreamTextParams = Parameters<typeof aiStreamText>[0];
type EmbedManyParams = Parameters<typeof embedMany>[0];

// text-embedding-ada-002 rejects the `dimensions` parameter
const DIMENSION_AWARE_MODEL = /^text-embedding-3-/;

export class OpenAiProvider implements AiProvider {
  public readonly name = 'openai';

  private readonly logger = new Logger(OpenAiProvider.name);
  private readonly client: ReturnType<typeof createOpenAI>;

  constructor(private readonly config: AiConfig['openai']) {
    this.client = this.createClient();
    this.logger.log(
      `OpenAI provider initialized with chat model: ${this.resolveChatModel()}, embedding model: ${this.resolveEmbeddingModel()}`,
    );
  }

  async *streamText(options: StreamTextOptions): AsyncIterable<string> {
    try {
      const streamOptions: StreamTextParams = {
        model: this.getChatModel(options.model),
        messages: options.messages,
        temperature: options.temperature ?? 0.3,
        abortSignal: options.abortSignal,
      };

      // AI SDK 5: maxTokens -> maxOutputTokens
      if (options.maxTokens !== undefined) {
        streamOptions.maxOutputTokens = options.maxTokens;
      }

      const result = aiStreamText(streamOptions);

      for await (const delta of result.textStream) {
        yield delta;
      }
    } catch (error) {
      this.logger.error(
        'OpenAI streaming failed',
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  async embedText(options: EmbedTextOptions): Promise<EmbedTextResult> {
    const modelName = this.resolveEmbeddingModel(options.model);
    try {
      const embeddingOptions: EmbedManyParams = {
        model: this.client.embedding(modelName),
        values: options.inputs,
        abortSignal: options.abortSignal,
        // retries and backoff belong to the ingestion pipeline
        maxRetries: 0,
      };
      if (
        options.dimensions !== undefined &&
        DIMENSION_AWARE_MODEL.test(modelName)
      ) {
        embeddingOptions.providerOptions = {
          openai: { dimensions: options.dimensions },
        };
      }
      const result = await embedMany(embeddingOptions);

      return {
        embeddings: result.embeddings.map((embedding) => Array.from(embedding)),
        raw: result,
      };
    } catch (error) {
      this.logger.error(
        'OpenAI embedding failed',
        error instanceof Error ? error.stack : error,
      );
      throw error;
    }
  }

  private resolveChatModel(model?: string) {
    return model ?? this.config.chatModel ?? 'gpt-4o-mini';
  }

  private resolveEmbeddingModel(model?: string) {
    return model ?? this.config.embeddingModel ?? 'text-embedding-3-small';
  }

  private getChatModel(model?: string): StreamTextParams['model'] {
    return this.client(this.resolveChatModel(model));
  }

  private createClient() {
    if (!this.config.apiKey) {
      throw new Error('OpenAI API key is not configured');
    }

    return createOpenAI({
      apiKey: this.config.apiKey,
    });
  }
}
