import { Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseModule, DatabaseService } from '../database/index.js';
import type {
  AppConfig,
  EmbeddingConfig,
  KnowledgeConfig,
} from '../config/index.js';
import {
  KNOWLEDGE_REPOSITORY_TOKEN,
  type KnowledgeRepository,
} from './knowledge.repository.js';
import { InMemoryKnowledgeRepository } from './in-memory-knowledge.repository.js';
import { PostgresKnowledgeRepository } from './postgres-knowledge.repository.js';

export function createKnowledgeRepository(
  configService: ConfigService<AppConfig>,
  database: DatabaseService,
): KnowledgeRepository {
  const knowledge = configService.get<KnowledgeConfig>('knowledge');
  const embedding = configService.get<EmbeddingConfig>('embedding');
  if (!knowledge || !embedding) {
    throw new Error('Knowledge store configuration is missing');
  }

  Logger.log(
    `Using ${knowledge.store} knowledge store (${embedding.dimensions} dimensions)`,
    'KnowledgeModule',
  );
  switch (knowledge.store) {
    case 'memory':
      return new InMemoryKnowledgeRepository(embedding.dimensions);
    case 'postgres':
      return new PostgresKnowledgeRepository(database, embedding.dimensions);
    default: {
      const store: string = knowledge.store;
      throw new Error(`Unsupported knowledge store: ${store}`);
    }
  }
}

@Module({
  imports: [DatabaseModule],
  providers: [
    {
      provide: KNOWLEDGE_REPOSITORY_TOKEN,
      useFactory: createKnowledgeRepository,
      inject: [ConfigService, DatabaseService],
    },
  ],
  exports: [KNOWLEDGE_REPOSITORY_TOKEN],
})
export class KnowledgeModule {}
