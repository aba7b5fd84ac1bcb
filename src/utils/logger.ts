/**
 * Structured logging for the transformation service.
 *
 * Every module logs through a child of the root logger tagged with its name.
 * Jobs and images are logged by reference under the `job` and `image` keys;
 * the serializers below reduce them to their identifying fields so request
 * payloads and pixel buffers never reach the log.
 */

import pino, { type Logger } from 'pino';

const isDevelopment = process.env.NODE_ENV === 'development';

interface LoggedJob {
  readonly id: string;
  readonly state: string;
  readonly workerId?: number;
  readonly timeoutMs: number;
}

interface LoggedImage {
  readonly width: number;
  readonly height: number;
  readonly data: Buffer;
  readonly format?: string;
  readonly channels?: number;
}

export function serializeJob(job: LoggedJob): Record<string, unknown> {
  return { id: job.id, state: job.state, workerId: job.workerId, timeoutMs: job.timeoutMs };
}

export function serializeImage(image: LoggedImage): Record<string, unknown> {
  return {
    format: image.format,
    width: image.width,
    height: image.height,
    channels: image.channels,
    bytes: image.data.length,
  };
}

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: isDevelopment
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  base: {
    service: 'pixel-forge',
    env: process.env.NODE_ENV,
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
    error: pino.stdSerializers.err,
    req: pino.stdSerializers.req,
    res: pino.stdSerializers.res,
    job: serializeJob,
    image: serializeImage,
  },
});

export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export type { Logger };
