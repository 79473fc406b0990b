import { Body, Controller, Logger, Post, Res } from '@nestjs/common';
import type { Response } from 'express';
import { randomUUID } from 'node:crypto';
import { resolveError } from '../common/api-exception.filter.js';
import { ChatStreamError } from './chat.errors.js';
import { ChatService } from './chat.service.js';
import { chatRequestSchema } from './dto/chat-request.dto.js';
import type { ChatSseEvent } from './chat.types.js';

const SSE_HEADERS: Record<string, string> = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache, no-transform',
  Connection: 'keep-alive',
};

const NO_ANSWER_FALLBACK =
  'No answer could be generated for this question. Please try rephrasing it.';

@Controller({
  path: 'api/v1/chat',
})
export class ChatController {
  private readonly logger = new Logger(ChatController.name);

  constructor(private readonly chatService: ChatService) {}

  @Post()
  async createChat(@Body() body: unknown, @Res() res: Response): Promise<void> {
    // validation failures are answered by the exception filter as plain JSON
    const payload = chatRequestSchema.parse(body);
    const requestId = randomUUID();

    if (process.env.NODE_ENV === 'development') {
      this.logger.log(
        `Chat request ${requestId} started (topK=${payload.topK ?? 'default'})`,
      );
    }

    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    res.writeHead(200, SSE_HEADERS);
    res.flushHeaders();

    const writeEvent = (event: ChatSseEvent) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    };

    try {
      const { stream, sources } = await this.chatService.createChatStream(
        payload,
        controller.signal,
      );
      writeEvent({ type: 'sources', data: sources });

      let hasDelta = false;
      for await (const delta of stream) {
        if (delta.trim().length > 0) {
          hasDelta = true;
        }
        writeEvent({ type: 'delta', data: delta });
      }

      if (!hasDelta) {
        this.logger.warn(
          `Chat request ${requestId} completed without AI deltas (sources: ${sources.length})`,
        );
        writeEvent({ type: 'delta', data: NO_ANSWER_FALLBACK });
      }

      writeEvent({ type: 'done' });
    } catch (error) {
      const { code, message } =
        error instanceof ChatStreamError ? error : resolveError(error);

      this.logger.error(
        `Chat request ${requestId} failed [${code}]: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error instanceof Error ? error.stack : undefined,
      );

      writeEvent({ type: 'error', data: { code, message, requestId } });
    } finally {
      res.end();
    }
  }
}
