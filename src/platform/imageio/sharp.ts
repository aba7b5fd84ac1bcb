/**
 * Sharp-based codec adapter
 *
 * Uses libvips via Sharp for decoding and encoding. Decoded images are
 * normalised to 8-bit sRGB with an alpha channel so that every transform
 * works on the same pixel layout.
 */

import sharp, { type Sharp } from 'sharp';
import type { Logger } from 'pino';
import { InputError, InternalError, OperationError, errorMessage } from '../../core/image/errors';
import type { ImageCodec } from '../../core/image/ports';
import {
  CONTENT_TYPES,
  DEFAULT_LIMITS,
  LOSSY_FORMATS,
  isOutputFormat,
  normalizeFormat,
  type EncodedImage,
  type ImageFormat,
  type OutputFormat,
  type PipelineLimits,
  type RasterImage,
} from '../../core/image/types';
import { createLogger } from '../../utils/logger';
import { sniffFormat } from './sniff';

/** Every decoded raster is RGBA */
export const RASTER_CHANNELS = 4;

const JPEG_BACKGROUND = { r: 255, g: 255, b: 255 };

type RawChannels = 1 | 2 | 3 | 4;

function rawChannels(channels: number): RawChannels {
  switch (channels) {
    case 1:
    case 2:
    case 3:
    case 4:
      return channels;
    default:
      throw new InternalError(`Unsupported channel count: ${channels}`, { channels });
  }
}

/** Wrap a raster as a sharp pipeline input */
export function fromRaster(image: RasterImage): Sharp {
  return sharp(image.data, {
    raw: {
      width: image.width,
      height: image.height,
      channels: rawChannels(image.channels),
    },
  });
}

/** Run a sharp pipeline to raw pixels and check the buffer invariant */
export async function toRaster(pipeline: Sharp): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  if (data.length !== info.width * info.height * info.channels) {
    throw new InternalError('Raster buffer does not match its dimensions', {
      width: info.width,
      height: info.height,
      channels: info.channels,
      length: data.length,
    });
  }
  return { width: info.width, height: info.height, channels: info.channels, data };
}

export class SharpImageCodec implements ImageCodec {
  private readonly logger: Logger;

  constructor(
    private readonly limits: PipelineLimits = DEFAULT_LIMITS,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('codec');
  }

  async decode(bytes: Buffer, declaredFormat?: ImageFormat): Promise<RasterImage> {
    const sniffed = sniffFormat(bytes);
    if (!sniffed) {
      throw new InputError('Unrecognised image format', 'UNSUPPORTED_FORMAT', {
        length: bytes.length,
      });
    }

    if (declaredFormat !== undefined && declaredFormat !== sniffed) {
      throw new InputError(
        `Declared format ${declaredFormat} does not match detected format ${sniffed}`,
        'FORMAT_MISMATCH',
        { declared: declaredFormat, detected: sniffed },
      );
    }

    const { maxDimension } = this.limits;
    const source = () =>
      sharp(bytes, {
        failOn: 'warning',
        limitInputPixels: maxDimension * maxDimension,
        pages: 1,
      });

    // Header only: nothing is allocated for pixels until the size is known to be sane
    let width: number | undefined;
    let height: number | undefined;
    try {
      ({ width, height } = await source().metadata());
    } catch (error) {
      throw new InputError(`Unreadable ${sniffed} header`, 'TRUNCATED_INPUT', {
        format: sniffed,
        reason: errorMessage(error),
      });
    }

    if (!width || !height) {
      throw new InputError(`Missing dimensions in ${sniffed} header`, 'TRUNCATED_INPUT', { format: sniffed });
    }

    if (width > maxDimension || height > maxDimension) {
      throw new InputError(
        `Image too large: ${width}x${height} exceeds ${maxDimension}px limit`,
        'INVALID_DIMENSIONS',
        { width, height, maxDimension },
      );
    }

    let image: RasterImage;
    try {
      image = await toRaster(source().ensureAlpha().toColorspace('srgb'));
    } catch (error) {
      throw new InputError(`Failed to decode ${sniffed} data`, 'TRUNCATED_INPUT', {
        format: sniffed,
        reason: errorMessage(error),
      });
    }

    if (image.channels !== RASTER_CHANNELS) {
      throw new InternalError(`Decoder produced ${image.channels} channels`, { format: sniffed });
    }

    this.logger.debug({ format: sniffed, image }, 'Decoded image');
    return image;
  }

  async encode(image: RasterImage, format: string, quality?: number): Promise<EncodedImage> {
    const normalized = normalizeFormat(format);
    if (!normalized || !isOutputFormat(normalized)) {
      throw new OperationError(`Unsupported output format: ${format}`, 'UNSUPPORTED_FORMAT', { format });
    }

    const effectiveQuality = this.resolveQuality(normalized, quality);

    let data: Buffer;
    try {
      data = await this.applyFormat(fromRaster(image), normalized, effectiveQuality).toBuffer();
    } catch (error) {
      throw new InternalError(`Failed to encode ${normalized}`, { reason: errorMessage(error) });
    }

    const encoded: EncodedImage = {
      data,
      format: normalized,
      contentType: CONTENT_TYPES[normalized],
      width: image.width,
      height: image.height,
    };
    this.logger.debug({ image: encoded, quality: effectiveQuality }, 'Encoded image');
    return encoded;
  }

  // Quality on a lossless format is accepted and ignored
  private resolveQuality(format: OutputFormat, quality: number | undefined): number | undefined {
    if (!LOSSY_FORMATS.has(format)) return undefined;
    if (quality === undefined) return this.limits.defaultQuality;
    if (!Number.isInteger(quality) || quality < 1 || quality > 100) {
      throw new OperationError(`Quality must be an integer between 1 and 100, got ${quality}`, 'QUALITY_OUT_OF_RANGE', {
        format,
        quality,
      });
    }
    return quality;
  }

  private applyFormat(pipeline: Sharp, format: OutputFormat, quality: number | undefined): Sharp {
    switch (format) {
      case 'png':
        return pipeline.png({ compressionLevel: 6 });
      case 'jpeg':
        return pipeline.flatten({ background: JPEG_BACKGROUND }).jpeg({ quality });
      case 'webp':
        return pipeline.webp({ quality });
      case 'avif':
        return pipeline.avif({ quality });
      case 'tiff':
        return pipeline.tiff({ compression: 'lzw' });
      default: {
        const unreachable: never = format;
        throw new OperationError(`Unsupported output format: ${String(unreachable)}`, 'UNSUPPORTED_FORMAT');
      }
    }
  }
}
