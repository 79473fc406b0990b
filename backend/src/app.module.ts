import { Module } from '@nestjs/common';
import { AppController } from './app.controller.js';
import { AppService } from './app.service.js';
import { AppConfigModule } from './config/index.js';
import { AiModule } from './ai/index.js';
import { KnowledgeModule } from './knowledge/index.js';
import { RetrievalModule } from './retrieval/index.js';
import { IngestionModule } from './ingestion/index.js';
import { SyncModule } from './sync/index.js';
import { ChatModule } from './chat/index.js';

@Module({
  imports: [
    AppConfigModule,
    AiModule,
    KnowledgeModule,
    RetrievalModule,
    IngestionModule,
    SyncModule,
    ChatModule,
  ],
  controllers: [AppController],
  providers: [AppService],
})
export class AppModule {}
