import type { Server } from 'http';
import type { Logger } from 'pino';
import type { PipelineScheduler } from '../queue/PipelineScheduler';
import { createLogger } from './logger';

export interface ShutdownOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class ShutdownTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Shutdown did not finish within ${timeoutMs}ms`);
    this.name = 'ShutdownTimeoutError';
  }
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Returns an idempotent shutdown function. The scheduler is closed first so
 * new submissions fail with SHUTTING_DOWN while queued and running jobs
 * finish; the listener then stops once their responses are written.
 */
export function createShutdown(
  server: Server,
  scheduler: PipelineScheduler,
  opts: ShutdownOptions = {},
): () => Promise<void> {
  const logger = opts.logger ?? createLogger('shutdown');
  const timeoutMs = opts.timeoutMs ?? 30_000;
  let pending: Promise<void> | undefined;

  const run = async (): Promise<void> => {
    logger.info('Starting graceful shutdown...');

    logger.info(scheduler.stats(), 'Draining scheduler (waiting for queued and running jobs)...');
    const drained = scheduler.close();

    logger.info('Stopping HTTP server...');
    await Promise.all([drained, closeServer(server)]);

    logger.info('Graceful shutdown complete');
  };

  return () => {
    if (pending) {
      logger.warn('Shutdown already in progress');
      return pending;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ShutdownTimeoutError(timeoutMs)), timeoutMs);
    });

    pending = Promise.race([run(), timeout]).finally(() => clearTimeout(timer));
    return pending;
  };
}
