import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Post,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { RetrievalService } from './retrieval.service.js';
import { retrieveRequestSchema } from './dto/retrieve-request.dto.js';

@Controller('api/v1/retrieval')
export class RetrievalController {
  constructor(private readonly retrievalService: RetrievalService) {}

  @Post('query')
  @HttpCode(HttpStatus.OK)
  async query(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: Response,
  ) {
    const payload = retrieveRequestSchema.parse(body);

    // abandon the searches when the client disconnects before the answer
    const controller = new AbortController();
    const onClose = () => {
      if (!response.writableFinished) {
        controller.abort();
      }
    };
    response.on('close', onClose);

    try {
      const results = await this.retrievalService.retrieve(payload.query, {
        k: payload.k,
        vectorWeight: payload.vectorWeight,
        keywordWeight: payload.keywordWeight,
        signal: controller.signal,
      });
      return { data: results };
    } finally {
      response.off('close', onClose);
    }
  }
}
