import { baseMimeType, normalizeExtractedText } from './text-extractor.js';
import type { TextExtractor } from './text-extractor.js';

const TEXT_MIME_TYPES = new Set([
  'text/plain',
  'text/markdown',
  'text/x-markdown',
  'text/csv',
  'application/json',
]);

export class PlainTextExtractor implements TextExtractor {
  public readonly name = 'plain-text';

  supports(mimeType: string): boolean {
    return TEXT_MIME_TYPES.has(baseMimeType(mimeType));
  }

  async extract(content: Buffer): Promise<string> {
    return normalizeExtractedText(content.toString('utf8'));
  }
}
