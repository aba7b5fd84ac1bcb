/**
 * Shared test fixtures: synthetic images, a small generated font and the
 * bundled font registry.
 */

import path from 'path';
import * as opentype from 'opentype.js';
import pino from 'pino';
import sharp from 'sharp';
import type { RasterImage, Rgba } from '../core/image/types';
import { FontRegistry } from '../platform/fonts/FontRegistry';

export const FONT_DIR = path.resolve(__dirname, '../../fonts');

export const silentLogger = pino({ level: 'silent' });

export const WHITE: Rgba = { r: 255, g: 255, b: 255, alpha: 1 };
export const BLACK: Rgba = { r: 0, g: 0, b: 0, alpha: 1 };

let bundled: Promise<FontRegistry> | undefined;

/** The fonts/ directory shipped with the service, loaded once per test file */
export function bundledFonts(): Promise<FontRegistry> {
  bundled ??= FontRegistry.load(FONT_DIR, silentLogger);
  return bundled;
}

export function solidRaster(width: number, height: number, color: Rgba = WHITE): RasterImage {
  const data = Buffer.alloc(width * height * 4);
  const alpha = Math.round(color.alpha * 255);
  for (let offset = 0; offset < data.length; offset += 4) {
    data[offset] = color.r;
    data[offset + 1] = color.g;
    data[offset + 2] = color.b;
    data[offset + 3] = alpha;
  }
  return { width, height, channels: 4, data };
}

/** Raster whose red channel encodes x and green channel encodes y */
export function gradientRaster(width: number, height: number): RasterImage {
  const data = Buffer.alloc(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const offset = (y * width + x) * 4;
      data[offset] = x % 256;
      data[offset + 1] = y % 256;
      data[offset + 2] = 128;
      data[offset + 3] = 255;
    }
  }
  return { width, height, channels: 4, data };
}

export function pixelAt(image: RasterImage, x: number, y: number): number[] {
  const offset = (y * image.width + x) * image.channels;
  return [...image.data.subarray(offset, offset + image.channels)];
}

export function encodeRaster(image: RasterImage, format: 'png' | 'jpeg' | 'gif' | 'webp' | 'tiff'): Promise<Buffer> {
  const pipeline = sharp(image.data, { raw: { width: image.width, height: image.height, channels: 4 } });
  switch (format) {
    case 'png':
      return pipeline.png().toBuffer();
    case 'jpeg':
      return pipeline.jpeg({ quality: 90 }).toBuffer();
    case 'gif':
      return pipeline.gif().toBuffer();
    case 'webp':
      return pipeline.webp({ quality: 90 }).toBuffer();
    case 'tiff':
      return pipeline.tiff().toBuffer();
  }
}

export function solidPng(width: number, height: number, color: Rgba = WHITE): Promise<Buffer> {
  return encodeRaster(solidRaster(width, height, color), 'png');
}

/** Mean absolute difference over every channel of two same-sized rasters */
export function meanAbsoluteError(a: RasterImage, b: RasterImage): number {
  let total = 0;
  for (let i = 0; i < a.data.length; i++) {
    total += Math.abs(a.data[i] - b.data[i]);
  }
  return total / a.data.length;
}

/**
 * A two-glyph TrueType font: `.notdef` plus a solid block for "A".
 * unitsPerEm 1000, ascender 800, descender -200.
 */
export function blockFontBytes(familyName = 'Block'): Buffer {
  const notdef = new opentype.Glyph({
    name: '.notdef',
    unicode: 0,
    advanceWidth: 600,
    path: new opentype.Path(),
  });

  const block = new opentype.Path();
  block.moveTo(0, -200);
  block.lineTo(0, 800);
  block.lineTo(1000, 800);
  block.lineTo(1000, -200);
  block.close();

  const glyphA = new opentype.Glyph({
    name: 'A',
    unicode: 65,
    advanceWidth: 1000,
    path: block,
  });

  const font = new opentype.Font({
    familyName,
    styleName: 'Regular',
    unitsPerEm: 1000,
    ascender: 800,
    descender: -200,
    glyphs: [notdef, glyphA],
  });
  return Buffer.from(font.toArrayBuffer());
}
