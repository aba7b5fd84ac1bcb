/**
 * Magic-byte format detection.
 *
 * Only the signature is inspected here; whether the rest of the file is
 * readable is the decoder's problem.
 */

import type { ImageFormat } from '../../core/image/types';

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
const JPEG_SIGNATURE = Buffer.from([0xff, 0xd8, 0xff]);
const TIFF_LE = Buffer.from([0x49, 0x49, 0x2a, 0x00]);
const TIFF_BE = Buffer.from([0x4d, 0x4d, 0x00, 0x2a]);
const AVIF_BRANDS = new Set(['avif', 'avis']);

function startsWith(bytes: Uint8Array, signature: Uint8Array, offset = 0): boolean {
  if (bytes.length < offset + signature.length) return false;
  for (let i = 0; i < signature.length; i++) {
    if (bytes[offset + i] !== signature[i]) return false;
  }
  return true;
}

function ascii(bytes: Uint8Array, start: number, end: number): string {
  return Buffer.from(bytes.subarray(start, end)).toString('latin1');
}

// ISO-BMFF: [size][ftyp][major brand][minor version][compatible brands...]
function isAvif(bytes: Uint8Array): boolean {
  if (bytes.length < 12 || ascii(bytes, 4, 8) !== 'ftyp') return false;
  if (AVIF_BRANDS.has(ascii(bytes, 8, 12))) return true;

  const view = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const boxEnd = Math.min(view.readUInt32BE(0), bytes.length);
  for (let offset = 16; offset + 4 <= boxEnd; offset += 4) {
    if (AVIF_BRANDS.has(ascii(bytes, offset, offset + 4))) return true;
  }
  return false;
}

export function sniffFormat(bytes: Uint8Array): ImageFormat | undefined {
  if (startsWith(bytes, PNG_SIGNATURE)) return 'png';
  if (startsWith(bytes, JPEG_SIGNATURE)) return 'jpeg';

  const head = ascii(bytes, 0, Math.min(bytes.length, 12));
  if (head.startsWith('GIF87a') || head.startsWith('GIF89a')) return 'gif';
  if (head.length === 12 && head.startsWith('RIFF') && head.slice(8) === 'WEBP') return 'webp';

  if (startsWith(bytes, TIFF_LE) || startsWith(bytes, TIFF_BE)) return 'tiff';
  if (isAvif(bytes)) return 'avif';

  return undefined;
}
