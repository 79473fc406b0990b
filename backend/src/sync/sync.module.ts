import { Module } from '@nestjs/common';
import { IngestionModule } from '../ingestion/index.js';
import { SyncController } from './sync.controller.js';
import { SyncService } from './sync.service.js';

@Module({
  imports: [IngestionModule],
  providers: [SyncService],
  controllers: [SyncController],
})
export class SyncModule {}
