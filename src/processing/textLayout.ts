import type { Rgba } from '../core/image/types';
import type { TextLayout } from '../platform/fonts/layout';
import { toSvgFill } from './color';

/**
 * Wrap laid-out text in an SVG the size of the canvas. The transformer
 * composites it at (0, 0), so anything past the edges is clipped.
 */
export function renderTextSvg(layout: TextLayout, width: number, height: number, color: Rgba): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    `<path d="${layout.pathData}" ${toSvgFill(color)}/>` +
    '</svg>'
  );
}
