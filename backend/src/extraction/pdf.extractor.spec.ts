import { describe, expect, it, jest } from '@jest/globals';

import { ExtractionFailedError } from '../common/errors.js';
import { PdfExtractor, type PdfPageReader } from './pdf.extractor.js';

describe('PdfExtractor', () => {
  it('joins page text with blank lines and skips empty pages', async () => {
    const readPages = jest.fn<PdfPageReader>();
    readPages.mockResolvedValue([
      ' Refund policy \r\nFive days ',
      '   ',
      'Contact support',
    ]);
    const extractor = new PdfExtractor(readPages);

    await expect(
      extractor.extract(Buffer.from('%PDF-1.7'), 'application/pdf'),
    ).resolves.toBe('Refund policy \nFive days\n\nContact support');
    expect(readPages.mock.calls[0][0]).toEqual(
      new Uint8Array(Buffer.from('%PDF-1.7')),
    );
  });

  it('only claims PDF content', () => {
    const extractor = new PdfExtractor(jest.fn<PdfPageReader>());

    expect(extractor.supports('Application/PDF')).toBe(true);
    expect(extractor.supports('text/plain')).toBe(false);
  });

  it('wraps parser failures', async () => {
    const readPages = jest.fn<PdfPageReader>();
    readPages.mockRejectedValue(new Error('Invalid PDF structure.'));
    const extractor = new PdfExtractor(readPages);

    const failure = extractor.extract(Buffer.from('%PDF'), 'application/pdf');

    await expect(failure).rejects.toBeInstanceOf(ExtractionFailedError);
    await expect(failure).rejects.toThrow(
      'could not read application/pdf content: Invalid PDF structure.',
    );
  });
});
