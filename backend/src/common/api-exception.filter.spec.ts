import { describe, expect, it } from '@jest/globals';
import { NotFoundException } from '@nestjs/common';
import { z } from 'zod';

import { resolveError } from './api-exception.filter.js';
import {
  DocumentNotFoundError,
  EmbeddingUnavailableError,
  IngestionFailedError,
} from './errors.js';

describe('resolveError', () => {
  it('maps knowledge base errors to their own status and code', () => {
    expect(resolveError(new DocumentNotFoundError('upload-1'))).toEqual({
      status: 404,
      code: 'DOCUMENT_NOT_FOUND',
      message: 'document upload-1 not found',
    });
  });

  it('keeps the status of the underlying failure when ingestion fails', () => {
    const error = new IngestionFailedError(
      'upload-1',
      new EmbeddingUnavailableError('provider down'),
    );

    expect(resolveError(error)).toEqual({
      status: 503,
      code: 'INGESTION_FAILED',
      message: 'ingestion of upload-1 failed: provider down',
    });
    expect(error.retryable).toBe(true);
  });

  it('reports validation issues with their paths', () => {
    const parsed = z
      .object({ question: z.string().min(1, 'question is required') })
      .safeParse({ question: '' });
    if (parsed.success) {
      throw new Error('expected validation to fail');
    }

    expect(resolveError(parsed.error)).toEqual({
      status: 400,
      code: 'VALIDATION_FAILED',
      message: 'question: question is required',
    });
  });

  it('passes framework http exceptions through', () => {
    expect(resolveError(new NotFoundException('no route'))).toEqual({
      status: 404,
      code: 'HTTP_404',
      message: 'no route',
    });
  });

  it('hides unexpected errors behind a generic message', () => {
    expect(resolveError(new Error('connection string leaked'))).toEqual({
      status: 500,
      code: 'INTERNAL_ERROR',
      message: 'internal server error',
    });
  });
});
