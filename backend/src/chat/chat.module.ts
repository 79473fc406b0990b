import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { RetrievalModule } from '../retrieval/index.js';
import { ChatController } from './chat.controller.js';
import { ChatService } from './chat.service.js';

@Module({
  imports: [AiModule, RetrievalModule],
  providers: [ChatService],
  controllers: [ChatController],
  exports: [ChatService],
})
export class ChatModule {}
