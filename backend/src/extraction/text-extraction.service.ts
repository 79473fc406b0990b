import { Inject, Injectable } from '@nestjs/common';
import { UnsupportedFormatError } from '../common/errors.js';
import { TEXT_EXTRACTORS_TOKEN } from './text-extractor.js';
import type { TextExtractor } from './text-extractor.js';

@Injectable()
export class TextExtractionService {
  constructor(
    @Inject(TEXT_EXTRACTORS_TOKEN)
    private readonly extractors: TextExtractor[],
  ) {}

  supports(mimeType: string): boolean {
    return this.extractors.some((extractor) => extractor.supports(mimeType));
  }

  async extract(content: Buffer, mimeType: string): Promise<string> {
    const extractor = this.extractors.find((candidate) =>
      candidate.supports(mimeType),
    );
    if (!extractor) {
      throw new UnsupportedFormatError(mimeType);
    }
    return extractor.extract(content, mimeType);
  }
}
