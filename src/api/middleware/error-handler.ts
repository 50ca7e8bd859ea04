/**
 * AgroCarbon - Error Handling Middleware
 */

import type { Request, Response, NextFunction } from 'express';
import log from '../../utils/logger';
import { AppError, ConfigurationError, getErrorMessage } from '../../engine/errors';

/**
 * JSON 404 for unknown routes
 */
export function notFound(req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
  });
}

/**
 * Felkoder för 4xx-fel från body-parser och andra Express-middleware
 */
const CLIENT_ERROR_CODES: Readonly<Record<number, { code: string; error: string }>> = {
  413: { code: 'PAYLOAD_TOO_LARGE', error: 'Request body too large' },
  415: { code: 'UNSUPPORTED_MEDIA_TYPE', error: 'Unsupported request body encoding' },
};

/**
 * Numeric 4xx status set by http-errors (body-parser, express.json)
 */
function clientErrorStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
}

/**
 * Maps AppError subclasses to their status and passes 4xx errors from
 * body parsing through; everything else is a 500.
 * User input problems (ValidationError) and data problems
 * (ConfigurationError) keep distinct codes.
 */
// eslint-disable-next-line @typescript-eslint/no-unused-vars
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err instanceof ConfigurationError) {
      log.error(`Configuration error in ${req.method} ${req.path}`, err, { entries: err.entries });
    } else {
      log.warn(`${err.code} in ${req.method} ${req.path}`, { message: err.message });
    }

    return res.status(err.statusCode).json({
      success: false,
      error: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
  }

  const status = clientErrorStatus(err);
  if (status !== undefined) {
    // body-parser sätter status 400 på trasig JSON
    const known = err instanceof SyntaxError && status === 400
      ? { code: 'INVALID_JSON', error: 'Malformed JSON body' }
      : CLIENT_ERROR_CODES[status] ?? { code: 'BAD_REQUEST', error: 'Bad request' };
    log.warn(`${known.code} in ${req.method} ${req.path}`, { status, message: getErrorMessage(err) });

    return res.status(status).json({
      success: false,
      error: known.error,
      code: known.code,
    });
  }

  log.error(`Unhandled error in ${req.method} ${req.path}`, err);
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
  });
}
