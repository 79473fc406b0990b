import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';
import { KnowledgeBaseError } from './errors.js';

export interface ApiErrorBody {
  error: {
    code: string;
    message: string;
    requestId: string;
  };
}

interface ResolvedError {
  status: number;
  code: string;
  message: string;
}

export function resolveError(exception: unknown): ResolvedError {
  if (exception instanceof KnowledgeBaseError) {
    return {
      status: exception.status,
      code: exception.code,
      message: exception.message,
    };
  }
  if (exception instanceof ZodError) {
    return {
      status: HttpStatus.BAD_REQUEST,
      code: 'VALIDATION_FAILED',
      message: exception.errors
        .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
        .join('; '),
    };
  }
  if (exception instanceof HttpException) {
    return {
      status: exception.getStatus(),
      code: `HTTP_${exception.getStatus()}`,
      message: exception.message,
    };
  }
  return {
    status: HttpStatus.INTERNAL_SERVER_ERROR,
    code: 'INTERNAL_ERROR',
    message: 'internal server error',
  };
}

@Catch()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const http = host.switchToHttp();
    const response = http.getResponse<Response>();
    const request = http.getRequest<Request>();
    const requestId = randomUUID();
    const resolved = resolveError(exception);

    const summary = `${request.method} ${request.url} failed [${resolved.code}] (request ${requestId}): ${
      exception instanceof Error ? exception.message : String(exception)
    }`;
    if (resolved.status >= 500) {
      this.logger.error(
        summary,
        exception instanceof Error ? exception.stack : undefined,
      );
    } else {
      this.logger.warn(summary);
    }

    if (response.headersSent) {
      response.end();
      return;
    }

    const body: ApiErrorBody = {
      error: {
        code: resolved.code,
        message: resolved.message,
        requestId,
      },
    };
    response.status(resolved.status).json(body);
  }
}
