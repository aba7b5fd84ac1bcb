import type { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import type { Logger } from 'pino';
import { isImageServiceError, type ErrorCode, type ImageServiceError } from '../core/image/errors';

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  UNSUPPORTED_FORMAT: 415,
  INVALID_DIMENSIONS: 413,
  INVALID_MANIFEST: 400,
  BUSY: 503,
  TIMEOUT: 504,
  SHUTTING_DOWN: 503,
};

const STATUS_BY_CATEGORY = {
  input: 400,
  operation: 422,
  resource: 503,
  system: 500,
} as const;

export function httpStatusFor(error: ImageServiceError): number {
  // Output format errors come from the manifest, not the body
  if (error.code === 'UNSUPPORTED_FORMAT' && error.category === 'operation') {
    return 422;
  }
  return STATUS_BY_CODE[error.code] ?? STATUS_BY_CATEGORY[error.category];
}

export function sendServiceError(res: Response, error: ImageServiceError): void {
  const status = httpStatusFor(error);
  if (error.code === 'BUSY') {
    res.setHeader('Retry-After', '1');
  }
  res.status(status).json(error.toJSON());
}

function hasStatus(error: unknown): error is { status: number; type?: string; message?: string } {
  return typeof error === 'object' && error !== null && typeof Reflect.get(error, 'status') === 'number';
}

/**
 * Final express error handler. Service errors map onto their status; body
 * parser and multer limits become 413; everything else is a 500.
 */
export function createErrorHandler(logger: Logger) {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isImageServiceError(error)) {
      logger.debug({ path: req.path, code: error.code }, error.message);
      sendServiceError(res, error);
      return;
    }

    if (error instanceof multer.MulterError) {
      const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({
        error: status === 413 ? 'PAYLOAD_TOO_LARGE' : 'INVALID_UPLOAD',
        category: 'input',
        message: error.message,
      });
      return;
    }

    if (hasStatus(error) && error.status === 413) {
      res.status(413).json({
        error: 'PAYLOAD_TOO_LARGE',
        category: 'input',
        message: 'Request body exceeds the configured upload limit',
      });
      return;
    }

    if (hasStatus(error) && error.status >= 400 && error.status < 500) {
      res.status(error.status).json({
        error: 'BAD_REQUEST',
        category: 'input',
        message: error.message ?? 'Malformed request',
      });
      return;
    }

    logger.error({ err: error, path: req.path, method: req.method }, 'Unhandled request error');
    res.status(500).json({
      error: 'INTERNAL',
      category: 'system',
      message: 'Internal server error',
    });
  };
}
