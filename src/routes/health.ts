import type { Express, Request, Response } from 'express';
import type { AppContext } from '../app/context';

export function registerHealthRoutes(app: Express, ctx: AppContext): void {
  const { scheduler, fonts } = ctx;

  app.get('/healthz', (_req: Request, res: Response) => {
    const stats = scheduler.stats();
    res.status(stats.closed ? 503 : 200).json({
      status: stats.closed ? 'shutting_down' : 'ok',
      scheduler: stats,
      fonts: fonts.ids(),
    });
  });
}
