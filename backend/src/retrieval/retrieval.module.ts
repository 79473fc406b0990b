import { Module } from '@nestjs/common';
import { EmbeddingModule } from '../embedding/index.js';
import { KnowledgeModule } from '../knowledge/index.js';
import { RetrievalController } from './retrieval.controller.js';
import { RetrievalService } from './retrieval.service.js';

@Module({
  imports: [EmbeddingModule, KnowledgeModule],
  providers: [RetrievalService],
  controllers: [RetrievalController],
  exports: [RetrievalService],
})
export class RetrievalModule {}
