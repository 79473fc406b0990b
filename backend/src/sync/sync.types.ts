export type SyncStatus =
  | 'indexed'
  | 'unchanged'
  | 'removed'
  | 'not_found'
  | 'ignored'
  | 'already_processed';

export interface SyncOutcome {
  status: SyncStatus;
  eventType: string;
  documentId?: string;
  chunkCount?: number;
}
