// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — Maps Thrown Errors to HTTP Responses
// ═══════════════════════════════════════════════════════════════════════════════

import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import {
  GenerationFailureError,
  NoPersonaError,
  NotFoundError,
  StoreUnavailableError,
} from '../../core/errors.js';
import { getLogger } from '../../logging/index.js';

const logger = getLogger({ component: 'error-handler' });

// ─────────────────────────────────────────────────────────────────────────────────
// ERROR CLASSES
// ─────────────────────────────────────────────────────────────────────────────────

export class ApiError extends Error {
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    readonly statusCode: number = 400,
    readonly code: string = 'BAD_REQUEST',
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR', details);
  }
}

export class InternalError extends ApiError {
  override readonly isOperational = false;

  constructor(message = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR');
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE SHAPE
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  error: string;
  code: string;
  details?: Record<string, unknown>;
  retryable?: boolean;
  timestamp: string;
}

export interface MappedError {
  status: number;
  body: Omit<ErrorResponseBody, 'timestamp'>;
}

/** The parts of the request and response the error middleware touches. */
export interface ErrorRequestInfo {
  path: string;
  method: string;
}

export interface ErrorResponseWriter {
  status(code: number): { json(body: ErrorResponseBody): unknown };
}

function isJsonSyntaxError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

// body-parser marks client errors (oversized or malformed bodies) with an exposed 4xx status
function clientStatus(error: unknown): number | null {
  if (typeof error !== 'object' || error === null) return null;
  if (!('status' in error) || !('expose' in error)) return null;
  const { status, expose } = error;
  return typeof status === 'number' && status >= 400 && status < 500 && expose === true ? status : null;
}

export function mapError(error: unknown): MappedError {
  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request',
        code: 'VALIDATION_ERROR',
        details: { fields: error.flatten().fieldErrors },
      },
    };
  }

  if (isJsonSyntaxError(error)) {
    return { status: 400, body: { error: 'Invalid JSON in request body', code: 'INVALID_JSON' } };
  }

  const status = clientStatus(error);
  if (status !== null) {
    const message = error instanceof Error ? error.message : 'Bad request';
    return { status, body: { error: message, code: status === 413 ? 'PAYLOAD_TOO_LARGE' : 'BAD_REQUEST' } };
  }

  if (error instanceof ApiError) {
    return {
      status: error.statusCode,
      body: { error: error.message, code: error.code, details: error.details },
    };
  }

  // NoPersonaError extends NotFoundError, so it is checked first
  if (error instanceof NoPersonaError) {
    return {
      status: 404,
      body: {
        error: 'No persona found. Complete the quiz to generate a persona first.',
        code: error.code,
      },
    };
  }

  if (error instanceof NotFoundError) {
    return { status: 404, body: { error: `${error.resource} not found`, code: error.code } };
  }

  if (error instanceof GenerationFailureError) {
    return {
      status: 502,
      body: { error: 'Could not produce a response, try again', code: error.code },
    };
  }

  if (error instanceof StoreUnavailableError) {
    return {
      status: 503,
      body: { error: 'Storage is temporarily unavailable', code: error.code, retryable: true },
    };
  }

  return { status: 500, body: { error: 'An unexpected error occurred', code: 'INTERNAL_ERROR' } };
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export function errorHandler(
  error: unknown,
  req: ErrorRequestInfo,
  res: ErrorResponseWriter,
  _next: NextFunction
): void {
  const { status, body } = mapError(error);

  if (status >= 500) {
    logger.error('Request failed', error, {
      path: req.path,
      method: req.method,
      status,
    });
  } else {
    logger.warn('Request rejected', { path: req.path, method: req.method, status, code: body.code });
  }

  const payload: ErrorResponseBody = { ...body, timestamp: new Date().toISOString() };
  if (payload.details === undefined) {
    delete payload.details;
  }

  res.status(status).json(payload);
}

/**
 * Forwards rejections from async route handlers to the error middleware.
 */
export type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

export function asyncHandler(handler: AsyncRouteHandler): AsyncRouteHandler {
  return (req, res, next) => handler(req, res, next).catch(next);
}
