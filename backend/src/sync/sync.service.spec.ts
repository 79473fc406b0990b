import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { ZodError } from 'zod';

import {
  DocumentNotFoundError,
  InvalidSignatureError,
} from '../common/errors.js';
import type { AppConfig } from '../config/index.js';
import { IngestionService, type IngestionOutcome } from '../ingestion/index.js';
import {
  driveNotificationSchema,
  type DriveNotificationDto,
} from './dto/drive-notification.dto.js';
import { SyncService } from './sync.service.js';
import { signPayload } from './webhook-signature.js';

type IngestFn = IngestionService['ingest'];
type IngestContentFn = IngestionService['ingestContent'];
type RemoveFn = IngestionService['remove'];
type ResolveFn = IngestionService['resolveDocumentId'];

const outcome = (status: IngestionOutcome['status']): IngestionOutcome => ({
  status,
  chunkCount: 2,
  document: {
    id: 'drive-doc',
    sourceType: 'drive',
    sourceKey: 'file-1',
    displayName: 'Handbook',
    fingerprint: 'fp',
    version: 1,
    chunkCount: 2,
    createdAt: new Date('2026-01-01T00:00:00Z'),
    lastIndexedAt: new Date('2026-01-01T00:00:00Z'),
  },
});

async function createService(webhookSecret: string | undefined) {
  const ingestion = {
    ingest: jest.fn<IngestFn>().mockResolvedValue(outcome('indexed')),
    ingestContent: jest
      .fn<IngestContentFn>()
      .mockResolvedValue(outcome('indexed')),
    remove: jest.fn<RemoveFn>().mockResolvedValue(undefined),
    resolveDocumentId: jest.fn<ResolveFn>(() => 'drive-doc'),
  };

  const module = await Test.createTestingModule({
    providers: [
      SyncService,
      { provide: IngestionService, useValue: ingestion },
      {
        provide: ConfigService,
        useValue: new ConfigService<AppConfig>({ sync: { webhookSecret } }),
      },
    ],
  }).compile();

  return { service: module.get(SyncService), ingestion };
}

const notification = (
  overrides: Partial<DriveNotificationDto> = {},
): DriveNotificationDto => ({
  fileId: 'file-1',
  eventType: 'update',
  eventTime: '2026-03-01T10:00:00Z',
  displayName: 'Handbook',
  content: 'Refunds take five days.',
  ...overrides,
});

describe('SyncService', () => {
  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('verify', () => {
    const body = Buffer.from('{"fileId":"file-1"}', 'utf8');

    it('accepts a valid signature', async () => {
      const { service } = await createService('test-secret');

      expect(() =>
        service.verify(body, signPayload(body, 'test-secret')),
      ).not.toThrow();
    });

    it('rejects a wrong or missing signature', async () => {
      const { service } = await createService('test-secret');

      expect(() =>
        service.verify(body, signPayload(body, 'other-secret')),
      ).toThrow(InvalidSignatureError);
      expect(() => service.verify(body, undefined)).toThrow(
        InvalidSignatureError,
      );
      expect(() =>
        service.verify(undefined, signPayload(body, 'test-secret')),
      ).toThrow(InvalidSignatureError);
    });

    it('skips verification when no secret is configured', async () => {
      const { service } = await createService(undefined);

      expect(() => service.verify(undefined, undefined)).not.toThrow();
    });
  });

  describe('handle', () => {
    let service: SyncService;
    let ingestion: Awaited<ReturnType<typeof createService>>['ingestion'];

    beforeEach(async () => {
      ({ service, ingestion } = await createService('test-secret'));
    });

    it('ingests created and updated files under their Drive id', async () => {
      const result = await service.handle(notification());

      expect(ingestion.ingest).toHaveBeenCalledWith({
        sourceType: 'drive',
        sourceKey: 'file-1',
        displayName: 'Handbook',
        text: 'Refunds take five days.',
      });
      expect(result).toEqual({
        status: 'indexed',
        eventType: 'update',
        documentId: 'drive-doc',
        chunkCount: 2,
      });
    });

    it('passes unchanged outcomes through', async () => {
      ingestion.ingest.mockResolvedValueOnce(outcome('unchanged'));

      const result = await service.handle(notification({ eventType: 'create' }));

      expect(result.status).toBe('unchanged');
    });

    it('extracts base64 content by MIME type', async () => {
      await service.handle(
        notification({
          content: undefined,
          contentBase64: Buffer.from('<p>Hi</p>').toString('base64'),
          mimeType: 'text/html',
        }),
      );

      expect(ingestion.ingest).not.toHaveBeenCalled();
      const [input] = ingestion.ingestContent.mock.calls[0] ?? [];
      expect(input?.mimeType).toBe('text/html');
      expect(input?.content.toString('utf8')).toBe('<p>Hi</p>');
    });

    it('ignores a notification it already processed', async () => {
      await service.handle(notification());

      const result = await service.handle(notification());

      expect(result).toEqual({
        status: 'already_processed',
        eventType: 'update',
      });
      expect(ingestion.ingest).toHaveBeenCalledTimes(1);
    });

    it('ignores a duplicate that arrives while the first is still applying', async () => {
      let release: (value: IngestionOutcome) => void = () => undefined;
      ingestion.ingest.mockImplementationOnce(
        () =>
          new Promise<IngestionOutcome>((resolve) => {
            release = resolve;
          }),
      );

      const first = service.handle(notification());
      const duplicate = await service.handle(notification());
      release(outcome('indexed'));

      expect(duplicate.status).toBe('already_processed');
      await expect(first).resolves.toMatchObject({ status: 'indexed' });
      expect(ingestion.ingest).toHaveBeenCalledTimes(1);
    });

    it('processes the same file again for a later event', async () => {
      await service.handle(notification());
      await service.handle(notification({ eventTime: '2026-03-01T11:00:00Z' }));

      expect(ingestion.ingest).toHaveBeenCalledTimes(2);
    });

    it('lets a failed notification be delivered again', async () => {
      ingestion.ingest.mockRejectedValueOnce(new Error('embedding down'));

      await expect(service.handle(notification())).rejects.toThrow(
        'embedding down',
      );
      await expect(service.handle(notification())).resolves.toMatchObject({
        status: 'indexed',
      });
    });

    it('removes trashed and deleted files', async () => {
      const trashed = await service.handle(
        notification({ eventType: 'trash', content: undefined }),
      );
      const deleted = await service.handle(
        notification({ eventType: 'delete', content: undefined }),
      );

      expect(ingestion.remove).toHaveBeenCalledWith('drive-doc');
      expect(trashed).toEqual({
        status: 'removed',
        eventType: 'trash',
        documentId: 'drive-doc',
      });
      expect(deleted.status).toBe('removed');
    });

    it('reports removal of a file that was never indexed', async () => {
      ingestion.remove.mockRejectedValueOnce(
        new DocumentNotFoundError('drive-doc'),
      );

      const result = await service.handle(
        notification({ eventType: 'trash', content: undefined }),
      );

      expect(result.status).toBe('not_found');
    });

    it('ignores other event types', async () => {
      const result = await service.handle(
        notification({ eventType: 'permissions', content: undefined }),
      );

      expect(result).toEqual({ status: 'ignored', eventType: 'permissions' });
      expect(ingestion.ingest).not.toHaveBeenCalled();
      expect(ingestion.remove).not.toHaveBeenCalled();
    });
  });
});

describe('driveNotificationSchema', () => {
  it('requires content for create and update events', () => {
    const result = driveNotificationSchema.safeParse({
      fileId: 'file-1',
      eventType: 'update',
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ZodError);
      expect(result.error.issues[0]?.path).toEqual(['content']);
    }
  });

  it('requires a MIME type with base64 content', () => {
    const result = driveNotificationSchema.safeParse({
      fileId: 'file-1',
      eventType: 'create',
      contentBase64: 'aGk=',
    });

    expect(result.success).toBe(false);
  });

  it('accepts a trash event without content', () => {
    expect(
      driveNotificationSchema.parse({ fileId: 'file-1', eventType: 'trash' }),
    ).toEqual({ fileId: 'file-1', eventType: 'trash' });
  });
});
