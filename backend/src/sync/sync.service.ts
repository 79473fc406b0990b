import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, SyncConfig } from '../config/index.js';
import {
  DocumentNotFoundError,
  InvalidSignatureError,
} from '../common/errors.js';
import { IngestionService } from '../ingestion/index.js';
import type { DriveNotificationDto } from './dto/drive-notification.dto.js';
import type { SyncOutcome } from './sync.types.js';
import { verifySignature } from './webhook-signature.js';

const MAX_REMEMBERED_NOTIFICATIONS = 10_000;
const INGEST_EVENTS = new Set(['create', 'update']);
const REMOVE_EVENTS = new Set(['trash', 'delete']);

/**
 * Applies Drive change notifications to the knowledge store. Files are keyed
 * by their Drive id, so an update lands on the same document as its create.
 */
@Injectable()
export class SyncService {
  private readonly logger = new Logger(SyncService.name);
  private readonly processed = new Set<string>();
  private readonly inFlight = new Set<string>();
  private readonly webhookSecret: string | undefined;

  constructor(
    private readonly ingestionService: IngestionService,
    configService: ConfigService<AppConfig>,
  ) {
    const settings = configService.get<SyncConfig>('sync');
    if (!settings) {
      throw new Error('Sync configuration is missing');
    }
    this.webhookSecret = settings.webhookSecret;
  }

  verify(payload: Buffer | undefined, signature: string | undefined): void {
    if (!this.webhookSecret) {
      this.logger.warn(
        'SYNC_WEBHOOK_SECRET is not set, skipping signature verification',
      );
      return;
    }
    if (!payload || !verifySignature(payload, signature, this.webhookSecret)) {
      throw new InvalidSignatureError();
    }
  }

  async handle(notification: DriveNotificationDto): Promise<SyncOutcome> {
    const { fileId, eventType } = notification;
    const key = `${fileId}:${eventType}:${notification.eventTime ?? ''}`;

    this.logger.log(`Drive notification ${eventType} for ${fileId}`);

    if (this.processed.has(key) || this.inFlight.has(key)) {
      this.logger.log(`Notification ${key} already processed`);
      return { status: 'already_processed', eventType };
    }

    // a failed notification is forgotten so the redelivery is applied
    this.inFlight.add(key);
    try {
      const outcome = await this.apply(notification);
      this.remember(key);
      return outcome;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async apply(notification: DriveNotificationDto): Promise<SyncOutcome> {
    const { fileId, eventType } = notification;
    const documentId = this.ingestionService.resolveDocumentId({
      sourceType: 'drive',
      sourceKey: fileId,
    });

    if (INGEST_EVENTS.has(eventType)) {
      const base = {
        sourceType: 'drive' as const,
        sourceKey: fileId,
        displayName: notification.displayName ?? fileId,
      };
      const result =
        notification.contentBase64 !== undefined &&
        notification.mimeType !== undefined
          ? await this.ingestionService.ingestContent({
              ...base,
              content: Buffer.from(notification.contentBase64, 'base64'),
              mimeType: notification.mimeType,
            })
          : await this.ingestionService.ingest({
              ...base,
              text: notification.content ?? '',
            });
      return {
        status: result.status,
        eventType,
        documentId: result.document.id,
        chunkCount: result.chunkCount,
      };
    }

    if (REMOVE_EVENTS.has(eventType)) {
      try {
        await this.ingestionService.remove(documentId);
        return { status: 'removed', eventType, documentId };
      } catch (error) {
        if (error instanceof DocumentNotFoundError) {
          this.logger.log(`Drive file ${fileId} was never indexed`);
          return { status: 'not_found', eventType, documentId };
        }
        throw error;
      }
    }

    this.logger.log(`Ignoring Drive event type ${eventType}`);
    return { status: 'ignored', eventType };
  }

  private remember(key: string): void {
    this.processed.add(key);
    if (this.processed.size > MAX_REMEMBERED_NOTIFICATIONS) {
      const oldest = this.processed.values().next();
      if (!oldest.done) {
        this.processed.delete(oldest.value);
      }
    }
  }
}
