export type AiMessageRole = 'system' | 'user' | 'assistant';

export interface AiMessage {
  role: AiMessageRole;
  content: string;
}

export interface StreamTextOptions {
  model?: string;
  messages: AiMessage[];
  temperature?: number;
  maxTokens?: number;
  abortSignal?: AbortSignal;
}

export interface EmbedTextOptions {
  model?: string;
  inputs: string[];
  /** Requested output size; only forwarded to models that accept it. */
  dimensions?: number;
  abortSignal?: AbortSignal;
}

export interface EmbedTextResult {
  embeddings: number[][];
  raw?: unknown;
}
