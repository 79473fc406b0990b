import { Inject, Injectable, Logger } from '@nestjs/common';
import { AIService } from './ai/index.js';
import { describeError } from './common/errors.js';
import {
  KNOWLEDGE_REPOSITORY_TOKEN,
  type KnowledgeRepository,
} from './knowledge/index.js';

export interface HealthReport {
  status: 'ok' | 'degraded';
  store: 'up' | 'down';
  aiProvider: string;
  timestamp: string;
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);

  constructor(
    @Inject(KNOWLEDGE_REPOSITORY_TOKEN)
    private readonly repository: KnowledgeRepository,
    private readonly aiService: AIService,
  ) {}

  async getHealth(): Promise<HealthReport> {
    let store: HealthReport['store'] = 'up';
    try {
      await this.repository.ping();
    } catch (error) {
      this.logger.warn(`Knowledge store unreachable: ${describeError(error)}`);
      store = 'down';
    }
    return {
      status: store === 'up' ? 'ok' : 'degraded',
      store,
      aiProvider: this.aiService.providerName,
      timestamp: new Date().toISOString(),
    };
  }
}
