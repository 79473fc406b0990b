import { Inject, Injectable } from '@nestjs/common';
import {
  KNOWLEDGE_REPOSITORY_TOKEN,
  type KnowledgeDocument,
  type KnowledgeRepository,
} from '../knowledge/index.js';

/**
 * Pure decision over the current record and a candidate fingerprint.
 */
export function needsReindex(
  current: Pick<KnowledgeDocument, 'fingerprint'> | undefined,
  fingerprint: string,
): boolean {
  return current === undefined || current.fingerprint !== fingerprint;
}

/**
 * Read-only: safe to call on every sync notification, it never touches
 * the stored record.
 */
@Injectable()
export class ChangeDetectorService {
  constructor(
    @Inject(KNOWLEDGE_REPOSITORY_TOKEN)
    private readonly repository: KnowledgeRepository,
  ) {}

  async shouldReindex(
    documentId: string,
    fingerprint: string,
  ): Promise<boolean> {
    const { reindex } = await this.inspect(documentId, fingerprint);
    return reindex;
  }

  /** The decision together with the record it was made against. */
  async inspect(
    documentId: string,
    fingerprint: string,
  ): Promise<{ current: KnowledgeDocument | undefined; reindex: boolean }> {
    const current = await this.repository.getDocument(documentId);
    return { current, reindex: needsReindex(current, fingerprint) };
  }
}
