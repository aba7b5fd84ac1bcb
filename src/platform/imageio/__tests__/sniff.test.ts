import { describe, it, expect } from 'vitest';
import { sniffFormat } from '../sniff';
import { encodeRaster, solidRaster } from '../../../__tests__/fixtures';

function ftyp(major: string, ...compatible: string[]): Buffer {
  const size = 16 + compatible.length * 4;
  const box = Buffer.alloc(size);
  box.writeUInt32BE(size, 0);
  box.write('ftyp', 4, 'latin1');
  box.write(major, 8, 'latin1');
  compatible.forEach((brand, index) => box.write(brand, 16 + index * 4, 'latin1'));
  return box;
}

describe('sniffFormat', () => {
  it('should detect formats produced by the encoder', async () => {
    const image = solidRaster(4, 4);
    expect(sniffFormat(await encodeRaster(image, 'png'))).toBe('png');
    expect(sniffFormat(await encodeRaster(image, 'jpeg'))).toBe('jpeg');
    expect(sniffFormat(await encodeRaster(image, 'gif'))).toBe('gif');
    expect(sniffFormat(await encodeRaster(image, 'webp'))).toBe('webp');
    expect(sniffFormat(await encodeRaster(image, 'tiff'))).toBe('tiff');
  });

  it('should detect both TIFF byte orders', () => {
    expect(sniffFormat(Buffer.from([0x49, 0x49, 0x2a, 0x00, 0x08]))).toBe('tiff');
    expect(sniffFormat(Buffer.from([0x4d, 0x4d, 0x00, 0x2a, 0x00]))).toBe('tiff');
  });

  describe('AVIF', () => {
    it('should detect the avif major brand', () => {
      expect(sniffFormat(ftyp('avif'))).toBe('avif');
    });

    it('should detect avif among the compatible brands', () => {
      expect(sniffFormat(ftyp('mif1', 'miaf', 'avif'))).toBe('avif');
    });

    it('should not treat other ISO-BMFF files as images', () => {
      expect(sniffFormat(ftyp('isom', 'mp41'))).toBeUndefined();
    });
  });

  it('should reject truncated signatures and unknown bytes', () => {
    expect(sniffFormat(Buffer.alloc(0))).toBeUndefined();
    expect(sniffFormat(Buffer.from([0x89, 0x50, 0x4e]))).toBeUndefined();
    expect(sniffFormat(Buffer.from('RIFF\0\0\0\0WAVE', 'latin1'))).toBeUndefined();
    expect(sniffFormat(Buffer.from('hello world, not an image'))).toBeUndefined();
  });
});
