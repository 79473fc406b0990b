import { Module } from '@nestjs/common';
import { DocxExtractor } from './docx.extractor.js';
import { HtmlExtractor } from './html.extractor.js';
import { PdfExtractor } from './pdf.extractor.js';
import { PlainTextExtractor } from './plain-text.extractor.js';
import { TEXT_EXTRACTORS_TOKEN } from './text-extractor.js';
import { TextExtractionService } from './text-extraction.service.js';

@Module({
  providers: [
    {
      provide: TEXT_EXTRACTORS_TOKEN,
      useFactory: () => [
        new PlainTextExtractor(),
        new HtmlExtractor(),
        new PdfExtractor(),
        new DocxExtractor(),
      ],
    },
    TextExtractionService,
  ],
  exports: [TextExtractionService],
})
export class ExtractionModule {}
