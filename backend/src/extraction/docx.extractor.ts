import mammoth from 'mammoth';
import { ExtractionFailedError } from '../common/errors.js';
import { baseMimeType, normalizeExtractedText } from './text-extractor.js';
import type { TextExtractor } from './text-extractor.js';

export const DOCX_MIME_TYPE =
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

export type DocxTextReader = (buffer: Buffer) => Promise<string>;

export const readDocxText: DocxTextReader = async (buffer) => {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
};

export class DocxExtractor implements TextExtractor {
  public readonly name = 'docx';

  constructor(private readonly readText: DocxTextReader = readDocxText) {}

  supports(mimeType: string): boolean {
    return baseMimeType(mimeType) === DOCX_MIME_TYPE;
  }

  async extract(content: Buffer, mimeType: string): Promise<string> {
    let text: string;
    try {
      text = await this.readText(content);
    } catch (error) {
      throw new ExtractionFailedError(baseMimeType(mimeType), error);
    }
    // mammoth ends every paragraph with a blank line
    return normalizeExtractedText(text).replace(/\n{3,}/g, '\n\n').trim();
  }
}
