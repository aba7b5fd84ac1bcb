/**
 * Single-line text layout over opentype.js outlines.
 *
 * The anchor (x, y) is the top-left corner of the line box: the baseline sits
 * one scaled ascender below y. Output is SVG path data in canvas pixels.
 *
 * Glyphs are placed one by one from the cmap with pair kerning applied. The
 * substitution tables (ligatures, mark composition) are not run: opentype.js
 * rejects several GSUB lookup formats that common fonts ship.
 */

import type { Glyph } from 'opentype.js';
import type { Font } from '../../core/image/ports';

export interface TextLayout {
  /** SVG path data for every glyph, empty when nothing is drawn */
  pathData: string;
  /** Advance width of the whole line in pixels */
  advance: number;
}

export function layoutText(font: Font, text: string, size: number, x: number, y: number): TextLayout {
  const scale = size / font.unitsPerEm;
  const baseline = y + font.ascender * scale;

  const parts: string[] = [];
  let penX = x;
  let previous: Glyph | undefined;

  for (const char of text) {
    const glyph = font.outlines.charToGlyph(char);
    if (previous) {
      penX += font.outlines.getKerningValue(previous, glyph) * scale;
    }

    const data = glyph.getPath(penX, baseline, size).toPathData(2);
    if (data !== '') {
      parts.push(data);
    }

    penX += (glyph.advanceWidth ?? 0) * scale;
    previous = glyph;
  }

  return { pathData: parts.join(' '), advance: penX - x };
}
