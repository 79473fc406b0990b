import { describe, expect, it, jest } from '@jest/globals';

import { ExtractionFailedError } from '../common/errors.js';
import {
  DOCX_MIME_TYPE,
  DocxExtractor,
  type DocxTextReader,
} from './docx.extractor.js';

describe('DocxExtractor', () => {
  it('collapses the blank lines between paragraphs', async () => {
    const readText = jest.fn<DocxTextReader>();
    readText.mockResolvedValue('Shipping\n\n\n\nOrders leave in two days.\n\n');
    const extractor = new DocxExtractor(readText);

    await expect(
      extractor.extract(Buffer.from('PK'), DOCX_MIME_TYPE),
    ).resolves.toBe('Shipping\n\nOrders leave in two days.');
  });

  it('only claims Word documents', () => {
    const extractor = new DocxExtractor(jest.fn<DocxTextReader>());

    expect(extractor.supports(`${DOCX_MIME_TYPE}; charset=binary`)).toBe(true);
    expect(extractor.supports('application/msword')).toBe(false);
  });

  it('wraps reader failures', async () => {
    const readText = jest.fn<DocxTextReader>();
    readText.mockRejectedValue(new Error('corrupt archive'));
    const extractor = new DocxExtractor(readText);

    await expect(
      extractor.extract(Buffer.from('PK'), DOCX_MIME_TYPE),
    ).rejects.toBeInstanceOf(ExtractionFailedError);
  });
});
