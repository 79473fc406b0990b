import { describe, expect, it } from '@jest/globals';

import {
  computeFingerprint,
  deriveDocumentId,
  normalizeForFingerprint,
} from './fingerprint.js';

describe('fingerprint', () => {
  it('collapses whitespace runs and trims', () => {
    expect(normalizeForFingerprint('  refund\n\n policy\t applies ')).toBe(
      'refund policy applies',
    );
  });

  it('ignores whitespace-only edits', () => {
    expect(computeFingerprint('refund policy\napplies')).toBe(
      computeFingerprint('refund   policy applies\n'),
    );
  });

  it('changes with the content', () => {
    expect(computeFingerprint('refund policy')).not.toBe(
      computeFingerprint('refund policies'),
    );
  });

  it('is a hex SHA-256 digest', () => {
    expect(computeFingerprint('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
  });

  it('derives a stable id per source', () => {
    const id = deriveDocumentId('drive', 'file-123');

    expect(id).toMatch(/^drive-[0-9a-f]{24}$/);
    expect(deriveDocumentId('drive', 'file-123')).toBe(id);
    expect(deriveDocumentId('drive', 'file-124')).not.toBe(id);
  });
});
