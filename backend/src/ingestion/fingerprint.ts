import { createHash } from 'node:crypto';
import type { DocumentSourceType } from '../knowledge/index.js';

/** Collapses every whitespace run to one space and trims the ends. */
export function normalizeForFingerprint(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * SHA-256 of the whitespace-normalised text. Edits that only reflow
 * whitespace keep the same fingerprint and so never trigger re-embedding.
 */
export function computeFingerprint(text: string): string {
  return createHash('sha256')
    .update(normalizeForFingerprint(text), 'utf8')
    .digest('hex');
}

/**
 * Stable document id for a source: the same upload path or Drive file id
 * always maps to the same document.
 */
export function deriveDocumentId(
  sourceType: DocumentSourceType,
  sourceKey: string,
): string {
  const digest = createHash('sha256')
    .update(`${sourceType}:${sourceKey}`, 'utf8')
    .digest('hex');
  return `${sourceType}-${digest.slice(0, 24)}`;
}
