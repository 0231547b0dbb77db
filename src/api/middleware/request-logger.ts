// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST LOGGER — Request IDs and Access Logging
// ═══════════════════════════════════════════════════════════════════════════════

import type { NextFunction, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logRequest } from '../../logging/index.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export interface RequestWithId extends Request {
  requestId?: string;
}

/**
 * Reuse a well-formed incoming `x-request-id`, otherwise mint a uuid.
 */
export function resolveRequestId(header: string | string[] | undefined): string {
  const candidate = Array.isArray(header) ? header[0] : header;
  if (candidate !== undefined && REQUEST_ID_PATTERN.test(candidate)) {
    return candidate;
  }
  return uuidv4();
}

export function requestIdMiddleware(req: RequestWithId, res: Response, next: NextFunction): void {
  const requestId = resolveRequestId(req.headers['x-request-id']);
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  next();
}

/**
 * Log one line per request once the response is finished.
 */
export function requestLoggerMiddleware(req: RequestWithId, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    logRequest({
      method: req.method,
      path: req.originalUrl.split('?')[0] ?? req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
      requestId: req.requestId ?? 'unknown',
      userAgent: req.headers['user-agent'],
    });
  });

  next();
}
