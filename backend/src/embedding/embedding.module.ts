import { Module } from '@nestjs/common';
import { AiModule } from '../ai/index.js';
import { EmbeddingGatewayService } from './embedding-gateway.service.js';

@Module({
  imports: [AiModule],
  providers: [EmbeddingGatewayService],
  exports: [EmbeddingGatewayService],
})
export class EmbeddingModule {}
