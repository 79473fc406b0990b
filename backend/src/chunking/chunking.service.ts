import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig, ChunkingConfig } from '../config/index.js';
import { chunkText, validateChunkingOptions } from './chunker.js';
import type { ChunkingOptions, TextChunk } from './chunker.js';

@Injectable()
export class ChunkingService {
  private readonly options: ChunkingOptions;

  constructor(configService: ConfigService<AppConfig>) {
    const options = configService.get<ChunkingConfig>('chunking');
    if (!options) {
      throw new Error('Chunking configuration is missing');
    }
    // fail at startup rather than on the first ingestion
    validateChunkingOptions(options);
    this.options = options;
  }

  chunk(text: string, overrides: Partial<ChunkingOptions> = {}): TextChunk[] {
    return chunkText(text, { ...this.options, ...overrides });
  }
}
