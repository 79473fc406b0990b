import { beforeEach, describe, expect, it } from '@jest/globals';

import {
  InMemoryKnowledgeRepository,
  type KnowledgeDocument,
} from '../knowledge/index.js';
import {
  ChangeDetectorService,
  needsReindex,
} from './change-detector.service.js';

const record = (fingerprint: string, version: number): KnowledgeDocument => ({
  id: 'A',
  sourceType: 'upload',
  sourceKey: 'a.md',
  displayName: 'a.md',
  fingerprint,
  version,
  chunkCount: 1,
  createdAt: new Date('2026-01-01T00:00:00Z'),
  lastIndexedAt: new Date('2026-01-01T00:00:00Z'),
});

describe('needsReindex', () => {
  it('is true without a record', () => {
    expect(needsReindex(undefined, 'F1')).toBe(true);
  });

  it('compares fingerprints', () => {
    expect(needsReindex({ fingerprint: 'F1' }, 'F1')).toBe(false);
    expect(needsReindex({ fingerprint: 'F1' }, 'F2')).toBe(true);
  });
});

describe('ChangeDetectorService', () => {
  let repository: InMemoryKnowledgeRepository;
  let detector: ChangeDetectorService;

  beforeEach(() => {
    repository = new InMemoryKnowledgeRepository(2);
    detector = new ChangeDetectorService(repository);
  });

  const store = (document: KnowledgeDocument, expectedVersion: number) =>
    repository.upsert(document.id, document.version, [], {
      document,
      expectedVersion,
    });

  it('follows the stored fingerprint through a reindex', async () => {
    await store(record('F1', 1), 0);

    await expect(detector.shouldReindex('A', 'F1')).resolves.toBe(false);
    await expect(detector.shouldReindex('A', 'F2')).resolves.toBe(true);

    await store(record('F2', 2), 1);

    await expect(detector.shouldReindex('A', 'F2')).resolves.toBe(false);
  });

  it('never changes the stored record', async () => {
    await store(record('F1', 1), 0);

    await detector.shouldReindex('A', 'F2');

    await expect(repository.getDocument('A')).resolves.toMatchObject({
      fingerprint: 'F1',
      version: 1,
    });
  });

  it('returns the record it decided against', async () => {
    await expect(detector.inspect('missing', 'F1')).resolves.toEqual({
      current: undefined,
      reindex: true,
    });
  });
});
