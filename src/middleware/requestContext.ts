import { randomUUID } from 'crypto';
import { ErrorRequestHandler, RequestHandler } from 'express';
import { toConverterError, toErrorBody } from '../utils/errors';
import type { Logger } from '../utils/logger';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export function ensureRequestId(value: string | undefined): string {
  return value && value.trim().length > 0 ? value.trim() : randomUUID();
}

export function requestContext(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const requestId = ensureRequestId(req.get(REQUEST_ID_HEADER));
    res.locals.requestId = requestId;
    res.locals.logger = logger.child({ requestId });
    res.setHeader(REQUEST_ID_HEADER, requestId);
    next();
  };
}

/**
 * Last-resort handler for errors raised before a controller runs,
 * e.g. the upload middleware rejecting the multipart form.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const requestLogger: Logger = res.locals.logger ?? logger;
    const error = toConverterError(err);
    if (error.statusCode >= 500) {
      requestLogger.error('Request failed before conversion', { kind: error.kind }, error);
    } else {
      requestLogger.warn('Request rejected before conversion', { kind: error.kind, detail: error.message });
    }
    res.status(error.statusCode).json(toErrorBody(error));
  };
}
