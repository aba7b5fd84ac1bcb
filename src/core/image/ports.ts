/**
 * Port interfaces for the image pipeline.
 *
 * The pipeline only talks to these; the sharp and opentype.js adapters under
 * platform/ provide the concrete implementations.
 */

import type { Font as OutlineFont } from 'opentype.js';
import type { EncodedImage, ImageFormat, RasterImage } from './types';

export interface ImageCodec {
  /**
   * Sniff, validate and decode input bytes into an RGBA raster.
   * Throws InputError on unsupported, mismatched, truncated or oversized input.
   */
  decode(bytes: Buffer, declaredFormat?: ImageFormat): Promise<RasterImage>;

  /**
   * Serialize a raster. Quality only matters for lossy formats.
   * Throws OperationError on an unsupported format or out-of-range quality.
   */
  encode(image: RasterImage, format: string, quality?: number): Promise<EncodedImage>;
}

/** A parsed font; shared read-only by every worker */
export interface Font {
  readonly id: string;
  readonly family: string;
  readonly path: string;
  readonly unitsPerEm: number;
  readonly ascender: number;
  readonly descender: number;
  /** Glyph outlines, metrics and kerning tables */
  readonly outlines: OutlineFont;
}

export interface FontProvider {
  /** Throws FontNotFoundError when the id is unknown */
  lookup(id: string): Font;
  ids(): string[];
}
