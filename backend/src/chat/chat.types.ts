export interface ChatSource {
  /** 1-based marker the answer cites as `[n]`. */
  order: number;
  documentId: string;
  chunkId: string;
  title: string;
  score: number;
}

export interface ChatErrorPayload {
  code: string;
  message: string;
  requestId: string;
}

export type ChatSseEvent =
  | { type: 'sources'; data: ChatSource[] }
  | { type: 'delta'; data: string }
  | { type: 'done' }
  | { type: 'error'; data: ChatErrorPayload };

export interface ChatStream {
  stream: AsyncIterable<string>;
  sources: ChatSource[];
}
