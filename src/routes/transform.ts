/**
 * Transform route
 *
 * POST /v1/transform takes the raw image as the request body and the
 * operation list as JSON in the X-Transform-Manifest header. The job runs on
 * the shared scheduler; the response is the encoded image or a typed error.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { AppContext } from '../app/context';
import { InputError } from '../core/image/errors';
import { MANIFEST_HEADER, decodeManifestHeader, formatFromContentType, toPipelineRequest } from '../api/manifest';
import type { EncodedImage } from '../core/image/types';

export function sendImage(res: Response, image: EncodedImage, jobId: string): void {
  res
    .status(200)
    .set({
      'Content-Type': image.contentType,
      'X-Image-Width': String(image.width),
      'X-Image-Height': String(image.height),
      'X-Job-Id': jobId,
    })
    .send(image.data);
}

export function registerTransformRoutes(app: Express, ctx: AppContext): void {
  const { config, scheduler, logger } = ctx;

  const rawBody = express.raw({
    type: () => true,
    limit: config.server.maxUploadBytes,
  });

  app.post('/v1/transform', rawBody, async (req: Request, res: Response, next: NextFunction) => {
    try {
      const manifest = decodeManifestHeader(req.headers[MANIFEST_HEADER], config.pipeline);
      const contentFormat = formatFromContentType(req.headers['content-type']);

      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new InputError('Request body is empty', 'TRUNCATED_INPUT');
      }

      const job = scheduler.submit(toPipelineRequest(body, manifest, contentFormat));
      const outcome = await job.outcome;
      if (outcome.status !== 'completed') {
        throw outcome.error;
      }

      logger.debug(
        { jobId: job.id, format: outcome.output.format, durationMs: outcome.durationMs },
        'Transform served',
      );
      sendImage(res, outcome.output, job.id);
    } catch (error) {
      next(error);
    }
  });
}
