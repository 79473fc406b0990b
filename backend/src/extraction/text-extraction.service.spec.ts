import { beforeEach, describe, expect, it } from '@jest/globals';
import { Test } from '@nestjs/testing';

import { UnsupportedFormatError } from '../common/errors.js';
import { DOCX_MIME_TYPE } from './docx.extractor.js';
import { ExtractionModule } from './extraction.module.js';
import { TextExtractionService } from './text-extraction.service.js';

describe('TextExtractionService', () => {
  let service: TextExtractionService;

  beforeEach(async () => {
    const module = await Test.createTestingModule({
      imports: [ExtractionModule],
    }).compile();
    service = module.get(TextExtractionService);
  });

  it('decodes plain text, dropping the BOM and normalising line endings', async () => {
    const content = Buffer.from('\uFEFFline one\r\nline two\rthree', 'utf8');

    await expect(service.extract(content, 'text/plain')).resolves.toBe(
      'line one\nline two\nthree',
    );
  });

  it('ignores MIME parameters and case', async () => {
    const content = Buffer.from('# Title', 'utf8');

    await expect(
      service.extract(content, 'Text/Markdown; charset=utf-8'),
    ).resolves.toBe('# Title');
  });

  it('converts HTML to Markdown without scripts or styles', async () => {
    const html =
      '<html><head><style>p{}</style></head><body><h1>Refunds</h1>' +
      '<p>Fish &amp; chips</p><script>track()</script></body></html>';

    await expect(
      service.extract(Buffer.from(html, 'utf8'), 'text/html'),
    ).resolves.toBe('# Refunds\n\nFish & chips');
  });

  it('registers extractors for PDF and Word documents', () => {
    expect(service.supports('application/pdf')).toBe(true);
    expect(service.supports(DOCX_MIME_TYPE)).toBe(true);
  });

  it('reports a Word document that is not a valid archive', async () => {
    await expect(
      service.extract(Buffer.from('not a zip archive'), DOCX_MIME_TYPE),
    ).rejects.toMatchObject({ code: 'EXTRACTION_FAILED', status: 422 });
  });

  it('rejects formats without an extractor', async () => {
    expect(service.supports('image/png')).toBe(false);
    await expect(
      service.extract(Buffer.from([0x89, 0x50]), 'image/png'),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });
});
