import type {
  DocumentSourceType,
  KnowledgeDocument,
} from '../knowledge/index.js';

export interface IngestDocumentInput {
  sourceType: DocumentSourceType;
  sourceKey: string;
  displayName: string;
  text: string;
  /** Overrides the id derived from `sourceType` and `sourceKey`. */
  documentId?: string;
}

export interface IngestContentInput extends Omit<IngestDocumentInput, 'text'> {
  content: Buffer;
  mimeType: string;
}

export type IngestionStatus = 'indexed' | 'unchanged';

export interface IngestionOutcome {
  status: IngestionStatus;
  document: KnowledgeDocument;
  chunkCount: number;
}
