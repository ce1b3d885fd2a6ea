import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { httpLogger } from '../../utils/logger.js';
import { captureError } from '../../utils/errorTracker.js';
import { AppError } from './index.js';

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    statusCode: number;
    details?: unknown;
  };
}

const FASTIFY_CODE_MAP: Record<string, { code: string; statusCode: number }> = {
  FST_ERR_CTP_BODY_TOO_LARGE: { code: 'PAYLOAD_TOO_LARGE', statusCode: 413 },
  FST_ERR_CTP_INVALID_MEDIA_TYPE: { code: 'UNSUPPORTED_MEDIA_TYPE', statusCode: 415 },
  FST_ERR_CTP_EMPTY_JSON_BODY: { code: 'VALIDATION_ERROR', statusCode: 400 },
  FST_ERR_CTP_INVALID_CONTENT_LENGTH: { code: 'VALIDATION_ERROR', statusCode: 400 },
};

function isFastifyError(error: unknown): error is FastifyError {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Map any thrown value to a response body and status.
 */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof AppError) {
    const { code, message, statusCode } = error;
    return { error: { code, message, statusCode } };
  }

  if (error instanceof ZodError) {
    return {
      error: {
        code: 'VALIDATION_ERROR',
        message: 'Invalid request',
        statusCode: 400,
        details: error.errors,
      },
    };
  }

  if (isFastifyError(error)) {
    const mapped = FASTIFY_CODE_MAP[error.code];
    if (mapped) {
      return { error: { ...mapped, message: error.message } };
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return { error: { code: error.code, message: error.message, statusCode: error.statusCode } };
    }
  }

  return { error: { code: 'INTERNAL_SERVER_ERROR', message: 'Internal Server Error', statusCode: 500 } };
}

export function createFastifyErrorHandler() {
  return (error: unknown, request: FastifyRequest, reply: FastifyReply): FastifyReply => {
    const body = toErrorBody(error);
    const { code, statusCode } = body.error;

    if (statusCode >= 500) {
      httpLogger.error({ err: error, statusCode, requestId: request.id, url: request.url }, `Request failed: ${code}`);
      captureError(error, { endpoint: request.routeOptions.url, requestId: request.id });
    } else {
      httpLogger.warn({ err: error, statusCode, requestId: request.id, url: request.url }, `Request rejected: ${code}`);
    }

    return reply.status(statusCode).send(body);
  };
}
