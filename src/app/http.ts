/**
 * HTTP application factory.
 * Core middleware here; routes are registered by the feature modules.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { AppContext } from './context';
import { createErrorHandler } from '../api/errors';
import { registerHealthRoutes } from '../routes/health';
import { registerTransformRoutes } from '../routes/transform';
import { registerWatermarkRoutes } from '../routes/watermark';

export function createApp(ctx: AppContext): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      ctx.logger.debug(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        'Request completed',
      );
    });
    next();
  });

  registerHealthRoutes(app, ctx);
  registerTransformRoutes(app, ctx);
  registerWatermarkRoutes(app, ctx);

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'NOT_FOUND',
      category: 'input',
      message: `No route for ${req.method} ${req.path}`,
    });
  });

  app.use(createErrorHandler(ctx.logger));

  return app;
}
