import { Injectable, Logger } from '@nestjs/common';
import { AIService, type AiMessage } from '../ai/index.js';
import { RetrievalService, type RetrievalResult } from '../retrieval/index.js';
import { ChatStreamError } from './chat.errors.js';
import type { ChatMessageDto, ChatRequestDto } from './dto/chat-request.dto.js';
import type { ChatSource, ChatStream } from './chat.types.js';

const CONTEXT_QUERY_MAX_LENGTH = 400;
const FOLLOW_UP_PREFIXES = ['and ', 'then ', 'also ', 'what about ', 'how about '];
const FOLLOW_UP_PRONOUNS = /\b(it|its|this|that|these|those|they|them)\b/i;

/**
 * Answers a question from the knowledge base: hybrid retrieval first, then a
 * streamed completion that may only cite the retrieved passages.
 */
@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name);

  constructor(
    private readonly retrievalService: RetrievalService,
    private readonly aiService: AIService,
  ) {}

  async createChatStream(
    request: ChatRequestDto,
    signal?: AbortSignal,
  ): Promise<ChatStream> {
    const question = request.question.trim();
    const searchQuery = this.buildContextAwareQuestion(question, request.history);

    const results = await this.retrievalService.retrieve(searchQuery, {
      k: request.topK,
      signal,
    });
    const sources = this.buildSources(results);

    if (process.env.NODE_ENV === 'development') {
      this.logger.debug(
        `Retrieved ${results.length} passages for "${searchQuery.substring(0, 50)}"`,
      );
    }

    const messages: AiMessage[] = [
      { role: 'system', content: this.buildSystemPrompt() },
      ...(request.history ?? []).map((message) => ({
        role: message.role,
        content: message.content,
      })),
      { role: 'user', content: this.buildUserPrompt(question, results) },
    ];

    const stream = this.aiService.streamText({
      messages,
      temperature: 0.2,
      abortSignal: signal,
    });

    return { stream: this.guardStream(stream), sources };
  }

  private buildSources(results: RetrievalResult[]): ChatSource[] {
    return results.map((result, index) => ({
      order: index + 1,
      documentId: result.chunk.documentId,
      chunkId: result.chunk.chunkId,
      title: result.sourceName,
      score: result.score,
    }));
  }

  private buildSystemPrompt(): string {
    return [
      'You answer questions using only the numbered passages supplied with each question.',
      'Cite every claim with the passage marker in square brackets, for example [2].',
      'If the passages do not contain the answer, say that the knowledge base has no information on it.',
      'Do not invent sources, and do not cite a marker that was not supplied.',
      'Lead with the answer, then the supporting detail.',
    ].join('\n');
  }

  private buildUserPrompt(question: string, results: RetrievalResult[]): string {
    if (results.length === 0) {
      return `Question: ${question}\n\nNo passages were found in the knowledge base.`;
    }
    const passages = results
      .map(
        (result, index) =>
          `[${index + 1}] ${result.sourceName}\n${result.chunk.text.trim()}`,
      )
      .join('\n\n');
    return `Passages:\n\n${passages}\n\nQuestion: ${question}`;
  }

  private guardStream(stream: AsyncIterable<string>): AsyncIterable<string> {
    const logger = this.logger;
    return {
      async *[Symbol.asyncIterator]() {
        let deltaCount = 0;
        try {
          for await (const delta of stream) {
            deltaCount++;
            if (deltaCount === 1) {
              logger.debug('First AI delta received');
            }
            yield delta;
          }
        } catch (error) {
          logger.error(
            `AI streaming failed after ${deltaCount} deltas`,
            error instanceof Error ? error.stack : undefined,
          );
          throw new ChatStreamError('STREAM_ERROR', 'answer generation failed', {
            cause: error,
          });
        }
      },
    };
  }

  /**
   * Short or pronoun-led follow-ups are searched together with the previous
   * user question, so "what about refunds?" keeps its subject.
   */
  private buildContextAwareQuestion(
    question: string,
    history?: ChatMessageDto[],
  ): string {
    if (!history?.length || !this.isFollowUpQuestion(question)) {
      return question;
    }

    const previous = this.extractLatestUserQuestion(history);
    if (!previous) {
      return question;
    }

    return this.truncateQuery(`${previous} ${question}`, CONTEXT_QUERY_MAX_LENGTH);
  }

  private isFollowUpQuestion(question: string): boolean {
    const normalized = question.toLowerCase().replace(/\s+/g, ' ').trim();
    if (normalized.length === 0) {
      return false;
    }
    if (normalized.split(' ').length <= 3) {
      return true;
    }
    if (FOLLOW_UP_PREFIXES.some((prefix) => normalized.startsWith(prefix))) {
      return true;
    }
    return FOLLOW_UP_PRONOUNS.test(normalized);
  }

  private extractLatestUserQuestion(
    history: ChatMessageDto[],
  ): string | undefined {
    for (let index = history.length - 1; index >= 0; index -= 1) {
      const message = history[index];
      if (message.role !== 'user') {
        continue;
      }
      const trimmed = message.content.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
    return undefined;
  }

  private truncateQuery(input: string, limit: number): string {
    if (input.length <= limit) {
      return input;
    }
    return input.slice(input.length - limit);
  }
}
