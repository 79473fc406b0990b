import { getDocument } from 'pdfjs-dist';
import { ExtractionFailedError } from '../common/errors.js';
import { baseMimeType, normalizeExtractedText } from './text-extractor.js';
import type { TextExtractor } from './text-extractor.js';

/** Returns the text of each page, in page order. */
export type PdfPageReader = (data: Uint8Array) => Promise<string[]>;

export const readPdfPages: PdfPageReader = async (data) => {
  const loadingTask = getDocument({ data, isEvalSupported: false });
  try {
    const pdf = await loadingTask.promise;
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber += 1) {
      const page = await pdf.getPage(pageNumber);
      const content = await page.getTextContent();
      const line = content.items
        .map((item) => ('str' in item ? item.str : ''))
        .join(' ');
      pages.push(line);
    }
    return pages;
  } finally {
    await loadingTask.destroy();
  }
};

/** Reads the text layer only; scanned pages without one contribute nothing. */
export class PdfExtractor implements TextExtractor {
  public readonly name = 'pdf';

  constructor(private readonly readPages: PdfPageReader = readPdfPages) {}

  supports(mimeType: string): boolean {
    return baseMimeType(mimeType) === 'application/pdf';
  }

  async extract(content: Buffer, mimeType: string): Promise<string> {
    let pages: string[];
    try {
      pages = await this.readPages(new Uint8Array(content));
    } catch (error) {
      throw new ExtractionFailedError(baseMimeType(mimeType), error);
    }
    return pages
      .map((page) => normalizeExtractedText(page).trim())
      .filter((page) => page.length > 0)
      .join('\n\n');
  }
}
