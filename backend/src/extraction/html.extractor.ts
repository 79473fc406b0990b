import TurndownService from 'turndown';
import { baseMimeType, normalizeExtractedText } from './text-extractor.js';
import type { TextExtractor } from './text-extractor.js';

/**
 * Exported Docs/HTML files become Markdown, so headings and paragraph breaks
 * survive as boundaries the chunker can split on.
 */
export class HtmlExtractor implements TextExtractor {
  public readonly name = 'html';

  private readonly turndown = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
  });

  constructor() {
    this.turndown.remove(['script', 'style', 'head']);
  }

  supports(mimeType: string): boolean {
    return baseMimeType(mimeType) === 'text/html';
  }

  async extract(content: Buffer): Promise<string> {
    const markdown = this.turndown.turndown(content.toString('utf8'));
    return normalizeExtractedText(markdown).trim();
  }
}
