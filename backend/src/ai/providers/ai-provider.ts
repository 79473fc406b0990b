import type {
  EmbedTextOptions,
  EmbedTextResult,
  StreamTextOptions,
} from '../ai.types.js';

export interface AiProvider {
  readonly name: string;
  streamText(options: StreamTextOptions): AsyncIterable<string>;
  embedText(options: EmbedTextOptions): Promise<EmbedTextResult>;
}
