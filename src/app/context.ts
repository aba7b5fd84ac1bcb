/**
 * AppContext: composition root.
 *
 * The only place that constructs concrete adapters. server.ts and the route
 * modules receive everything they need through the context.
 */

import type { Logger } from 'pino';
import type { AppConfig } from '../config';
import type { FontProvider, ImageCodec } from '../core/image/ports';
import type { PipelineLimits } from '../core/image/types';
import { FontRegistry } from '../platform/fonts/FontRegistry';
import { SharpImageCodec } from '../platform/imageio/sharp';
import { ImagePipeline } from '../processing/ImagePipeline';
import { ImageTransformer } from '../processing/ImageTransformer';
import { PipelineScheduler } from '../queue/PipelineScheduler';
import { logger as rootLogger } from '../utils/logger';

export interface AppContext {
  config: AppConfig;
  logger: Logger;
  fonts: FontProvider;
  codec: ImageCodec;
  pipeline: ImagePipeline;
  scheduler: PipelineScheduler;
}

export interface ContextOverrides {
  fonts?: FontProvider;
  logger?: Logger;
}

/**
 * Wire the pipeline and scheduler. Fonts are loaded here unless supplied;
 * a FontLoadError propagates so the caller can refuse to start serving.
 */
export async function createContext(config: AppConfig, overrides: ContextOverrides = {}): Promise<AppContext> {
  const logger = overrides.logger ?? rootLogger;
  if (!overrides.logger) {
    rootLogger.level = config.logLevel;
  }

  const fonts = overrides.fonts ?? (await FontRegistry.load(config.fonts.directory, logger.child({ module: 'fonts' })));

  const limits: PipelineLimits = {
    maxDimension: config.pipeline.maxDimension,
    defaultQuality: config.pipeline.defaultQuality,
  };

  const codec = new SharpImageCodec(limits, logger.child({ module: 'codec' }));
  const transformer = new ImageTransformer(fonts, limits, logger.child({ module: 'transformer' }));
  const pipeline = new ImagePipeline(codec, transformer, logger.child({ module: 'pipeline' }));
  const scheduler = new PipelineScheduler(pipeline, config.scheduler, logger.child({ module: 'scheduler' }));

  return { config, logger, fonts, codec, pipeline, scheduler };
}
