/**
 * Legacy watermark route
 *
 * POST /img-watermark keeps the original form-upload contract: a multipart
 * form with the image in `file` plus optional `text`, `scale`, `posx` and
 * `posy` fields. The text is drawn in black with the default font and the
 * result is always a JPEG. GET /img-watermark serves the upload form and
 * GET / a landing page, both from templates/.
 */

import { readFileSync } from 'fs';
import path from 'path';
import type { Express, NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { AppContext } from '../app/context';
import { InputError, OperationError } from '../core/image/errors';
import type { PipelineRequest } from '../core/image/types';
import { sendImage } from './transform';

export const WATERMARK_FONT_ID = 'default';

const TEMPLATE_DIR = path.resolve(__dirname, '../../templates');

function loadTemplate(name: string): string {
  return readFileSync(path.join(TEMPLATE_DIR, name), 'utf8');
}

const WatermarkFormSchema = z.object({
  text: z.string().default('Blue Bird'),
  scale: z.coerce.number().positive().default(18),
  posx: z.coerce.number().int().min(0).default(0),
  posy: z.coerce.number().int().min(0).default(0),
});

export type WatermarkForm = z.infer<typeof WatermarkFormSchema>;

// A browser posts untouched inputs as empty strings
function withoutBlankFields(fields: unknown): Record<string, unknown> {
  if (typeof fields !== 'object' || fields === null) {
    return {};
  }
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== ''));
}

export function parseWatermarkForm(fields: unknown): WatermarkForm {
  const result = WatermarkFormSchema.safeParse(withoutBlankFields(fields));
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new OperationError(`Invalid watermark form: ${issues.join('; ')}`, 'INVALID_OPERATION', { issues });
  }
  return result.data;
}

export function watermarkRequest(input: Buffer, form: WatermarkForm): PipelineRequest {
  return {
    input,
    operations: [
      {
        type: 'overlayText',
        text: form.text,
        fontId: WATERMARK_FONT_ID,
        size: form.scale,
        x: form.posx,
        y: form.posy,
        color: { r: 0, g: 0, b: 0, alpha: 1 },
      },
    ],
    output: { format: 'jpeg' },
  };
}

export function registerWatermarkRoutes(app: Express, ctx: AppContext): void {
  const { config, scheduler } = ctx;

  const uploadPage = loadTemplate('upload.html');
  const landingPage = loadTemplate('index.html');

  app.get('/', (_req: Request, res: Response) => {
    res.type('html').send(landingPage);
  });

  app.get('/img-watermark', (_req: Request, res: Response) => {
    res.type('html').send(uploadPage);
  });

  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.server.maxUploadBytes, files: 1 },
  });

  app.post('/img-watermark', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
    try {
      const form = parseWatermarkForm(req.body);
      if (!req.file || req.file.buffer.length === 0) {
        throw new InputError("Missing image upload in form field 'file'", 'TRUNCATED_INPUT');
      }

      const job = scheduler.submit(watermarkRequest(req.file.buffer, form));
      const outcome = await job.outcome;
      if (outcome.status !== 'completed') {
        throw outcome.error;
      }
      sendImage(res, outcome.output, job.id);
    } catch (error) {
      next(error);
    }
  });
}
