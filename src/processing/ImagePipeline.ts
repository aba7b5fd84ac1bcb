/**
 * Image pipeline: decode → transform(s) → encode
 *
 * The pipeline itself has no notion of time. Whoever runs it passes a
 * StageContext whose checkpoint() is called at every stage boundary; the
 * scheduler uses that to enforce its per-job deadline. A single stage is never
 * interrupted, so the deadline is a best-effort bound.
 */

import type { Logger } from 'pino';
import type { ImageCodec } from '../core/image/ports';
import type { EncodedImage, PipelineRequest, RasterImage } from '../core/image/types';
import { createLogger } from '../utils/logger';
import type { ImageTransformer } from './ImageTransformer';

export interface StageContext {
  /** Called between stages; throws to abandon the pipeline */
  checkpoint(stage: string): void;
}

export interface PipelineProcessor {
  process(request: PipelineRequest, context: StageContext): Promise<EncodedImage>;
}

export const UNBOUNDED: StageContext = {
  checkpoint: () => undefined,
};

export class ImagePipeline implements PipelineProcessor {
  private readonly logger: Logger;

  constructor(
    private readonly codec: ImageCodec,
    private readonly transformer: ImageTransformer,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('pipeline');
  }

  async process(request: PipelineRequest, context: StageContext = UNBOUNDED): Promise<EncodedImage> {
    let image: RasterImage = await this.codec.decode(request.input, request.inputFormat);
    context.checkpoint('decode');

    for (const [index, operation] of request.operations.entries()) {
      image = await this.transformer.apply(image, operation);
      context.checkpoint(`${operation.type}#${index}`);
    }

    const encoded = await this.codec.encode(image, request.output.format, request.output.quality);
    this.logger.debug({ operations: request.operations.length, image: encoded }, 'Pipeline finished');
    return encoded;
  }
}
