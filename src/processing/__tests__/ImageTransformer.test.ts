import { describe, it, expect, beforeAll } from 'vitest';
import { OperationError } from '../../core/image/errors';
import type { RasterImage } from '../../core/image/types';
import { FontRegistry, parseFont } from '../../platform/fonts/FontRegistry';
import { ImageTransformer, rotatedBounds } from '../ImageTransformer';
import {
  BLACK,
  blockFontBytes,
  bundledFonts,
  gradientRaster,
  pixelAt,
  silentLogger,
  solidRaster,
} from '../../__tests__/fixtures';

const limits = { maxDimension: 256, defaultQuality: 80 };

// "A" in the block font is a solid square covering the whole line box
const blockFonts = FontRegistry.fromFonts([parseFont('block', 'block.otf', blockFontBytes())]);
const transformer = new ImageTransformer(blockFonts, limits, silentLogger);

function darkPixels(image: RasterImage): number {
  let count = 0;
  for (let offset = 0; offset < image.data.length; offset += image.channels) {
    if (image.data[offset] < 128) count++;
  }
  return count;
}

describe('ImageTransformer', () => {
  describe('resize', () => {
    it.each(['nearest', 'bilinear', 'bicubic', 'lanczos'] as const)(
      'should produce exactly the requested size with %s',
      async (filter) => {
        const resized = await transformer.apply(gradientRaster(40, 20), {
          type: 'resize',
          width: 10,
          height: 5,
          filter,
        });

        expect(resized.width).toBe(10);
        expect(resized.height).toBe(5);
        expect(resized.channels).toBe(4);
        expect(resized.data.length).toBe(10 * 5 * 4);
      },
    );

    it('should ignore aspect ratio', async () => {
      const resized = await transformer.apply(solidRaster(10, 10), {
        type: 'resize',
        width: 30,
        height: 3,
        filter: 'nearest',
      });
      expect([resized.width, resized.height]).toEqual([30, 3]);
    });

    it.each([
      [0, 10],
      [10, -1],
      [1.5, 10],
      [257, 10],
    ])('should reject %s x %s', async (width, height) => {
      await expect(
        transformer.apply(solidRaster(4, 4), { type: 'resize', width, height, filter: 'nearest' }),
      ).rejects.toMatchObject({ code: 'INVALID_OPERATION', category: 'operation' });
    });
  });

  describe('crop', () => {
    it('should extract the rectangle', async () => {
      const cropped = await transformer.apply(gradientRaster(20, 10), {
        type: 'crop',
        x: 5,
        y: 2,
        width: 4,
        height: 3,
      });

      expect([cropped.width, cropped.height]).toEqual([4, 3]);
      expect(pixelAt(cropped, 0, 0)).toEqual([5, 2, 128, 255]);
      expect(pixelAt(cropped, 3, 2)).toEqual([8, 4, 128, 255]);
    });

    it('should accept a crop covering the whole image', async () => {
      const image = gradientRaster(6, 4);
      const cropped = await transformer.apply(image, { type: 'crop', x: 0, y: 0, width: 6, height: 4 });
      expect(cropped.data.equals(image.data)).toBe(true);
    });

    it.each([
      { x: 17, y: 0, width: 4, height: 4 },
      { x: 0, y: 8, width: 4, height: 3 },
      { x: -1, y: 0, width: 4, height: 4 },
      { x: 0, y: 0, width: 0, height: 4 },
      { x: 0.5, y: 0, width: 4, height: 4 },
      { x: 40, y: 40, width: 1, height: 1 },
    ])('should reject out-of-bounds rectangle %o', async (rect) => {
      await expect(transformer.apply(gradientRaster(20, 10), { type: 'crop', ...rect })).rejects.toMatchObject({
        code: 'INVALID_CROP',
      });
    });
  });

  describe('rotate', () => {
    it('should turn a quarter clockwise', async () => {
      const rotated = await transformer.apply(gradientRaster(20, 10), { type: 'rotate', degrees: 90 });

      expect([rotated.width, rotated.height]).toEqual([10, 20]);
      // the old bottom-left corner lands top-left
      expect(pixelAt(rotated, 0, 0)).toEqual([0, 9, 128, 255]);
    });

    it('should treat -90 as 270', async () => {
      const rotated = await transformer.apply(gradientRaster(20, 10), { type: 'rotate', degrees: -90 });

      expect([rotated.width, rotated.height]).toEqual([10, 20]);
      // the old top-right corner lands top-left
      expect(pixelAt(rotated, 0, 0)).toEqual([19, 0, 128, 255]);
    });

    it('should return an unchanged copy for full turns', async () => {
      const image = gradientRaster(8, 4);
      const rotated = await transformer.apply(image, { type: 'rotate', degrees: 360 });

      expect(rotated.data).not.toBe(image.data);
      expect(rotated.data.equals(image.data)).toBe(true);
    });

    it('should grow the canvas to the rotated bounds and fill corners with transparency', async () => {
      const rotated = await transformer.apply(solidRaster(40, 20), { type: 'rotate', degrees: 30 });
      const expected = rotatedBounds(40, 20, 30);

      expect(expected).toEqual({ width: 45, height: 37 });
      expect(Math.abs(rotated.width - expected.width)).toBeLessThanOrEqual(1);
      expect(Math.abs(rotated.height - expected.height)).toBeLessThanOrEqual(1);
      expect(pixelAt(rotated, 0, 0)[3]).toBe(0);
    });

    it('should use the requested background', async () => {
      const rotated = await transformer.apply(solidRaster(40, 20, BLACK), {
        type: 'rotate',
        degrees: 45,
        background: { r: 255, g: 0, b: 0, alpha: 1 },
      });
      expect(pixelAt(rotated, 0, 0)).toEqual([255, 0, 0, 255]);
    });

    it('should refuse a rotation whose canvas exceeds the limit', async () => {
      await expect(
        transformer.apply(solidRaster(200, 200), { type: 'rotate', degrees: 45 }),
      ).rejects.toMatchObject({ code: 'INVALID_OPERATION', details: { width: 283, height: 283 } });
    });

    it('should reject non-finite angles', async () => {
      await expect(transformer.apply(solidRaster(4, 4), { type: 'rotate', degrees: Number.NaN })).rejects.toThrow(
        OperationError,
      );
    });
  });

  describe('overlayText', () => {
    const overlay = { type: 'overlayText', text: 'A', fontId: 'block', size: 10, x: 5, y: 5, color: BLACK } as const;

    it('should draw the glyph with its line box anchored at (x, y)', async () => {
      const drawn = await transformer.apply(solidRaster(40, 40), overlay);

      expect([drawn.width, drawn.height]).toEqual([40, 40]);
      expect(pixelAt(drawn, 10, 10)).toEqual([0, 0, 0, 255]);
      expect(pixelAt(drawn, 6, 14)).toEqual([0, 0, 0, 255]);
      expect(pixelAt(drawn, 2, 2)).toEqual([255, 255, 255, 255]);
      expect(pixelAt(drawn, 20, 10)).toEqual([255, 255, 255, 255]);
      expect(pixelAt(drawn, 10, 20)).toEqual([255, 255, 255, 255]);
    });

    it('should leave the input raster untouched', async () => {
      const image = solidRaster(20, 20);
      const before = Buffer.from(image.data);
      await transformer.apply(image, overlay);
      expect(image.data.equals(before)).toBe(true);
    });

    it('should clip glyphs that run past the edges', async () => {
      const drawn = await transformer.apply(solidRaster(40, 40), { ...overlay, x: 35, y: -5 });

      expect([drawn.width, drawn.height]).toEqual([40, 40]);
      expect(pixelAt(drawn, 38, 2)).toEqual([0, 0, 0, 255]);
      expect(pixelAt(drawn, 38, 8)).toEqual([255, 255, 255, 255]);
    });

    it('should blend translucent colours', async () => {
      const drawn = await transformer.apply(solidRaster(40, 40), {
        ...overlay,
        color: { r: 0, g: 0, b: 0, alpha: 0.5 },
      });
      const [r] = pixelAt(drawn, 10, 10);
      expect(r).toBeGreaterThanOrEqual(126);
      expect(r).toBeLessThanOrEqual(129);
    });

    it('should return an unchanged copy for empty text', async () => {
      const image = solidRaster(10, 10);
      const drawn = await transformer.apply(image, { ...overlay, text: '' });
      expect(drawn.data.equals(image.data)).toBe(true);
    });

    it('should fail with FONT_NOT_FOUND for an unknown font, even with nothing to draw', async () => {
      await expect(
        transformer.apply(solidRaster(10, 10), { ...overlay, fontId: 'missing', text: '' }),
      ).rejects.toMatchObject({ code: 'FONT_NOT_FOUND', details: { fontId: 'missing' } });
    });

    it.each([0, -3, 2000, Number.POSITIVE_INFINITY])('should reject text size %s', async (size) => {
      await expect(transformer.apply(solidRaster(10, 10), { ...overlay, size })).rejects.toMatchObject({
        code: 'INVALID_OPERATION',
      });
    });

    describe('with the bundled fonts', () => {
      let bundled: ImageTransformer;

      beforeAll(async () => {
        bundled = new ImageTransformer(await bundledFonts(), limits, silentLogger);
      });

      it('should render real glyph outlines', async () => {
        const drawn = await bundled.apply(solidRaster(60, 30), {
          ...overlay,
          text: 'hi',
          fontId: 'default',
          size: 16,
          x: 2,
          y: 2,
        });
        expect(darkPixels(drawn)).toBeGreaterThan(10);
      });
    });
  });
});
