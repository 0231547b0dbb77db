// ═══════════════════════════════════════════════════════════════════════════════
// ERROR HANDLER — API Error Types and Express Error Middleware
// ═══════════════════════════════════════════════════════════════════════════════
//
// Every failure reaches the client as:
//
//   { error, code, details?, requestId?, timestamp }
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { loadConfig } from '../../config/index.js';
import { EngineValidationError, ReferenceDataNotReadyError } from '../../engine/errors.js';
import { getLogger } from '../../logging/index.js';
import type { RequestWithId } from './request-logger.js';

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
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export class ValidationError extends ApiError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  constructor(resource: string, id?: string) {
    super(id !== undefined ? `${resource} not found: ${id}` : `${resource} not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ServiceUnavailableError extends ApiError {
  constructor(message: string = 'Service unavailable', details?: unknown) {
    super(message, 503, 'NOT_READY', details);
    this.name = 'ServiceUnavailableError';
  }
}

export class InternalError extends ApiError {
  override readonly isOperational = false;

  constructor(message: string = 'Internal server error') {
    super(message, 500, 'INTERNAL_ERROR');
    this.name = 'InternalError';
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// RESPONSE BODY
// ─────────────────────────────────────────────────────────────────────────────────

export interface ErrorResponseBody {
  error: string;
  code: string;
  details?: unknown;
  requestId?: string;
  timestamp: string;
}

const GENERIC_MESSAGE = 'Internal server error';

function isJsonParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Client errors raised by express.json(): oversized bodies, unsupported
 * charsets and the like. They carry a 4xx `status`, `expose: true` and a
 * dotted `type` such as `entity.too.large`.
 */
function isExposedClientError(error: unknown): error is Error & { status: number; type?: unknown } {
  return (
    error instanceof Error &&
    'expose' in error &&
    error.expose === true &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

function clientErrorCode(type: unknown): string {
  return typeof type === 'string' && type.length > 0 ? type.replace(/\./g, '_').toUpperCase() : 'BAD_REQUEST';
}

/**
 * Map anything thrown by a route onto an ApiError.
 */
export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => ({
      field: issue.path.join('.') || 'body',
      message: issue.message,
    }));
    return new ValidationError(issues[0]?.message ?? 'Invalid request', { issues });
  }

  if (error instanceof EngineValidationError) {
    return new ValidationError(error.message, { issues: error.issues });
  }

  if (error instanceof ReferenceDataNotReadyError) {
    return new ServiceUnavailableError(error.message, { state: error.state });
  }

  if (isJsonParseError(error)) {
    return new ApiError('Invalid JSON in request body', 400, 'INVALID_JSON');
  }

  if (isExposedClientError(error)) {
    return new ApiError(error.message, error.status, clientErrorCode(error.type));
  }

  return new InternalError(GENERIC_MESSAGE);
}

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

export function errorHandler(error: unknown, req: RequestWithId, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(error);
    return;
  }

  const apiError = toApiError(error);
  const production = loadConfig().environment === 'production';

  if (apiError.statusCode >= 500) {
    logger.error('Request failed', error instanceof Error ? error : undefined, {
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    });
  }

  const sanitize = production && !apiError.isOperational;
  const body: ErrorResponseBody = {
    error: sanitize ? GENERIC_MESSAGE : apiError.message,
    code: apiError.code,
    timestamp: new Date().toISOString(),
  };

  if (apiError.details !== undefined && !sanitize) {
    body.details = apiError.details;
  }
  if (req.requestId) {
    body.requestId = req.requestId;
  }

  res.status(apiError.statusCode).json(body);
}

/**
 * Unmatched routes.
 */
export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Endpoint'));
}

/**
 * Forward a rejected handler promise to the error middleware.
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<void>
): (req: Req, res: Response, next: NextFunction) => Promise<void> {
  return (req, res, next) => fn(req, res, next).catch(next);
}

