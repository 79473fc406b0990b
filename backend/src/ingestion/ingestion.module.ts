import { Module } from '@nestjs/common';
import { ChunkingModule } from '../chunking/index.js';
import { EmbeddingModule } from '../embedding/index.js';
import { ExtractionModule } from '../extraction/index.js';
import { KnowledgeModule } from '../knowledge/index.js';
import { ChangeDetectorService } from './change-detector.service.js';
import { IngestionService } from './ingestion.service.js';
import { KnowledgeController } from './knowledge.controller.js';

@Module({
  imports: [ChunkingModule, EmbeddingModule, ExtractionModule, KnowledgeModule],
  providers: [ChangeDetectorService, IngestionService],
  controllers: [KnowledgeController],
  exports: [ChangeDetectorService, IngestionService],
})
export class IngestionModule {}
