/**
 * Error taxonomy for the image service.
 *
 * Every failure a caller can observe is an ImageServiceError carrying a
 * category (what kind of problem) and a code (which problem). The HTTP
 * boundary maps categories and codes onto status codes one to one.
 */

export type ErrorCategory = 'input' | 'operation' | 'resource' | 'system';

export type InputErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'FORMAT_MISMATCH'
  | 'TRUNCATED_INPUT'
  | 'INVALID_DIMENSIONS';

export type OperationErrorCode =
  | 'INVALID_OPERATION'
  | 'INVALID_CROP'
  | 'FONT_NOT_FOUND'
  | 'QUALITY_OUT_OF_RANGE'
  | 'UNSUPPORTED_FORMAT'
  | 'INVALID_MANIFEST';

export type ResourceErrorCode = 'BUSY' | 'TIMEOUT' | 'SHUTTING_DOWN';

export type SystemErrorCode = 'FONT_LOAD_FAILED' | 'INTERNAL';

export type ErrorCode = InputErrorCode | OperationErrorCode | ResourceErrorCode | SystemErrorCode;

export abstract class ImageServiceError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { error: ErrorCode; category: ErrorCategory; message: string; details?: Record<string, unknown> } {
    return {
      error: this.code,
      category: this.category,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/** Problems with the input bytes themselves */
export class InputError extends ImageServiceError {
  readonly category = 'input' as const;

  constructor(message: string, code: InputErrorCode, details?: Record<string, unknown>) {
    super(message, code, details);
  }
}

/** Problems with what the caller asked us to do */
export class OperationError extends ImageServiceError {
  readonly category = 'operation' as const;

  constructor(message: string, code: OperationErrorCode, details?: Record<string, unknown>) {
    super(message, code, details);
  }
}

export class FontNotFoundError extends OperationError {
  constructor(public readonly fontId: string) {
    super(`Font not found: ${fontId}`, 'FONT_NOT_FOUND', { fontId });
  }
}

export abstract class ResourceError extends ImageServiceError {
  readonly category = 'resource' as const;
}

export class ServiceBusyError extends ResourceError {
  constructor(queueCapacity: number) {
    super(`Job queue is full (capacity ${queueCapacity})`, 'BUSY', { queueCapacity });
  }
}

export class JobTimeoutError extends ResourceError {
  constructor(
    public readonly jobId: string,
    public readonly timeoutMs: number,
    public readonly stage: string,
  ) {
    super(`Job ${jobId} exceeded its ${timeoutMs}ms deadline after ${stage}`, 'TIMEOUT', {
      jobId,
      timeoutMs,
      stage,
    });
  }
}

export class SchedulerClosedError extends ResourceError {
  constructor() {
    super('Scheduler is shutting down and accepts no new jobs', 'SHUTTING_DOWN');
  }
}

export abstract class SystemError extends ImageServiceError {
  readonly category = 'system' as const;
}

/** Fatal at startup: the service never begins serving with a partial font table */
export class FontLoadError extends SystemError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FONT_LOAD_FAILED', details);
  }
}

export class InternalError extends SystemError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INTERNAL', details);
  }
}

export function isImageServiceError(error: unknown): error is ImageServiceError {
  return error instanceof ImageServiceError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
