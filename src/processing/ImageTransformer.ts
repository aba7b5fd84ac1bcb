/**
 * Transform stage
 *
 * Applies one Operation to a RasterImage and returns a new RasterImage. The
 * input buffer is never written to, so a job's previous stage output stays
 * valid until the pipeline drops it.
 */

import type { Logger } from 'pino';
import { OperationError } from '../core/image/errors';
import type { FontProvider } from '../core/image/ports';
import {
  DEFAULT_LIMITS,
  type CropOperation,
  type Operation,
  type OverlayTextOperation,
  type PipelineLimits,
  type RasterImage,
  type ResizeFilter,
  type ResizeOperation,
  type RotateOperation,
  type Rgba,
} from '../core/image/types';
import { layoutText } from '../platform/fonts/layout';
import { fromRaster, toRaster } from '../platform/imageio/sharp';
import { createLogger } from '../utils/logger';
import { renderTextSvg } from './textLayout';

export const MAX_TEXT_SIZE = 1024;
export const MAX_TEXT_LENGTH = 1024;

const TRANSPARENT: Rgba = { r: 0, g: 0, b: 0, alpha: 0 };

const KERNELS = {
  nearest: 'nearest',
  bilinear: 'linear',
  bicubic: 'cubic',
  lanczos: 'lanczos3',
} as const satisfies Record<ResizeFilter, string>;

function cloneRaster(image: RasterImage): RasterImage {
  return { ...image, data: Buffer.from(image.data) };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** Axis-aligned bounding box of a w×h rectangle rotated by `degrees` */
export function rotatedBounds(width: number, height: number, degrees: number): { width: number; height: number } {
  const radians = (degrees * Math.PI) / 180;
  const cos = Math.abs(Math.cos(radians));
  const sin = Math.abs(Math.sin(radians));
  return {
    width: Math.round(width * cos + height * sin),
    height: Math.round(width * sin + height * cos),
  };
}

export class ImageTransformer {
  private readonly logger: Logger;

  constructor(
    private readonly fonts: FontProvider,
    private readonly limits: PipelineLimits = DEFAULT_LIMITS,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('transformer');
  }

  async apply(image: RasterImage, operation: Operation): Promise<RasterImage> {
    switch (operation.type) {
      case 'resize':
        return this.resize(image, operation);
      case 'crop':
        return this.crop(image, operation);
      case 'rotate':
        return this.rotate(image, operation);
      case 'overlayText':
        return this.overlayText(image, operation);
      default: {
        const unknown: never = operation;
        throw new OperationError(`Unknown operation: ${JSON.stringify(unknown)}`, 'INVALID_OPERATION');
      }
    }
  }

  async resize(image: RasterImage, op: ResizeOperation): Promise<RasterImage> {
    const { maxDimension } = this.limits;
    for (const [axis, value] of [['width', op.width], ['height', op.height]] as const) {
      if (!isPositiveInteger(value) || value > maxDimension) {
        throw new OperationError(
          `Resize ${axis} must be an integer between 1 and ${maxDimension}, got ${value}`,
          'INVALID_OPERATION',
          { operation: 'resize', [axis]: value },
        );
      }
    }

    const kernel = KERNELS[op.filter];
    if (!kernel) {
      throw new OperationError(`Unknown resize filter: ${op.filter}`, 'INVALID_OPERATION', { filter: op.filter });
    }

    return toRaster(
      fromRaster(image).resize(op.width, op.height, {
        fit: 'fill',
        kernel,
      }),
    );
  }

  async crop(image: RasterImage, op: CropOperation): Promise<RasterImage> {
    const { x, y, width, height } = op;
    const wellFormed =
      Number.isInteger(x) && Number.isInteger(y) && isPositiveInteger(width) && isPositiveInteger(height);
    const inside = wellFormed && x >= 0 && y >= 0 && x + width <= image.width && y + height <= image.height;

    // Never clamped
    if (!inside) {
      throw new OperationError(
        `Crop rectangle ${x},${y} ${width}x${height} is not inside ${image.width}x${image.height}`,
        'INVALID_CROP',
        { x, y, width, height, imageWidth: image.width, imageHeight: image.height },
      );
    }

    return toRaster(fromRaster(image).extract({ left: x, top: y, width, height }));
  }

  async rotate(image: RasterImage, op: RotateOperation): Promise<RasterImage> {
    if (!Number.isFinite(op.degrees)) {
      throw new OperationError(`Rotation must be a finite number of degrees, got ${op.degrees}`, 'INVALID_OPERATION', {
        degrees: op.degrees,
      });
    }

    const degrees = ((op.degrees % 360) + 360) % 360;
    if (degrees === 0) {
      return cloneRaster(image);
    }

    const { maxDimension } = this.limits;
    const bounds = rotatedBounds(image.width, image.height, degrees);
    if (bounds.width > maxDimension || bounds.height > maxDimension) {
      throw new OperationError(
        `Rotated canvas ${bounds.width}x${bounds.height} exceeds ${maxDimension}px limit`,
        'INVALID_OPERATION',
        { degrees: op.degrees, ...bounds, maxDimension },
      );
    }

    const rotated = await toRaster(
      fromRaster(image).rotate(degrees, { background: op.background ?? TRANSPARENT }),
    );

    if (rotated.width > maxDimension || rotated.height > maxDimension) {
      throw new OperationError(
        `Rotated canvas ${rotated.width}x${rotated.height} exceeds ${maxDimension}px limit`,
        'INVALID_OPERATION',
        { width: rotated.width, height: rotated.height, maxDimension },
      );
    }
    return rotated;
  }

  async overlayText(image: RasterImage, op: OverlayTextOperation): Promise<RasterImage> {
    // Resolve first: an unknown font fails the job even when there is nothing to draw
    const font = this.fonts.lookup(op.fontId);

    if (!Number.isFinite(op.size) || op.size <= 0 || op.size > MAX_TEXT_SIZE) {
      throw new OperationError(`Text size must be in (0, ${MAX_TEXT_SIZE}], got ${op.size}`, 'INVALID_OPERATION', {
        size: op.size,
      });
    }
    if (!Number.isFinite(op.x) || !Number.isFinite(op.y)) {
      throw new OperationError('Text position must be finite', 'INVALID_OPERATION', { x: op.x, y: op.y });
    }
    if (op.text.length > MAX_TEXT_LENGTH) {
      throw new OperationError(`Text longer than ${MAX_TEXT_LENGTH} characters`, 'INVALID_OPERATION', {
        length: op.text.length,
      });
    }

    const layout = layoutText(font, op.text, op.size, op.x, op.y);
    if (layout.pathData === '') {
      return cloneRaster(image);
    }

    this.logger.debug(
      { fontId: font.id, size: op.size, x: op.x, y: op.y, advance: layout.advance },
      'Overlaying text',
    );

    const svg = renderTextSvg(layout, image.width, image.height, op.color);
    return toRaster(fromRaster(image).composite([{ input: Buffer.from(svg), left: 0, top: 0 }]));
  }
}
