import type { Server } from 'http';
import { ConfigError, loadConfig } from './config';
import { createContext } from './app/context';
import { createApp } from './app/http';
import { FontLoadError } from './core/image/errors';
import { createLogger } from './utils/logger';
import { createShutdown } from './utils/shutdown';

const logger = createLogger('main');

function listen(app: ReturnType<typeof createApp>, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

async function main(): Promise<void> {
  logger.info('Starting image transformation service...');

  logger.info('Loading configuration...');
  const config = loadConfig();

  logger.info({ directory: config.fonts.directory }, 'Loading fonts and building pipeline...');
  const ctx = await createContext(config);

  const app = createApp(ctx);
  const server = await listen(app, config.server.port, config.server.host);
  logger.info(
    {
      host: config.server.host,
      port: config.server.port,
      workers: config.scheduler.workers,
      queueCapacity: config.scheduler.queueCapacity,
    },
    'HTTP server listening',
  );

  const shutdown = createShutdown(server, ctx.scheduler, { logger: createLogger('shutdown') });
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Received termination signal, initiating graceful shutdown');
    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed, forcing exit');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError || error instanceof FontLoadError) {
    logger.fatal({ err: error }, error.message);
  } else {
    logger.fatal({ err: error }, 'Fatal error during startup');
  }
  process.exit(1);
});
