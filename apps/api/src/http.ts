import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ZodError } from 'zod';

import type { ErrorResponse } from '@salonsvc/contracts';
import { serializeError, type Logger } from '@salonsvc/shared';

import { AppError } from './errors';
import type { ServiceObservability } from './observability';

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>,
): RequestHandler {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
}

export function formatValidationError(err: ZodError): ErrorResponse {
  return {
    error: {
      code: 'VALIDATION_ERROR',
      message: 'Invalid request',
      details: err.errors.map((issue) => ({
        path: issue.path,
        message: issue.message,
      })),
    },
  };
}

export function requestLogger(logger: Logger, observability: ServiceObservability): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      const durationMs = Date.now() - startedAt;
      observability.observeRequest(res.statusCode, durationMs);
      logger.info('http request', {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs,
      });
    });
    next();
  };
}

function isMalformedBody(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function errorMiddleware(logger: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof AppError) {
      const body: ErrorResponse = { error: { code: err.code, message: err.message } };
      res.status(err.statusCode).json(body);
      return;
    }

    if (err instanceof ZodError) {
      res.status(400).json(formatValidationError(err));
      return;
    }

    if (isMalformedBody(err)) {
      const body: ErrorResponse = { error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } };
      res.status(400).json(body);
      return;
    }

    logger.error('unhandled request error', {
      method: req.method,
      path: req.path,
      ...serializeError(err),
    });
    const cause = err instanceof Error ? err.message : String(err);
    const body: ErrorResponse = { error: { code: 'INTERNAL', message: `Internal server error: ${cause}` } };
    res.status(500).json(body);
  };
}
