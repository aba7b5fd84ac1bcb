import type { Rgba } from '../core/image/types';

const NAMED_COLORS: Record<string, Rgba> = {
  black: { r: 0, g: 0, b: 0, alpha: 1 },
  white: { r: 255, g: 255, b: 255, alpha: 1 },
  red: { r: 255, g: 0, b: 0, alpha: 1 },
  green: { r: 0, g: 128, b: 0, alpha: 1 },
  blue: { r: 0, g: 0, b: 255, alpha: 1 },
  yellow: { r: 255, g: 255, b: 0, alpha: 1 },
  gray: { r: 128, g: 128, b: 128, alpha: 1 },
  grey: { r: 128, g: 128, b: 128, alpha: 1 },
  transparent: { r: 0, g: 0, b: 0, alpha: 0 },
};

const HEX_COLOR = /^#([0-9a-f]{3}|[0-9a-f]{6}|[0-9a-f]{8})$/i;

/**
 * Parse `#rgb`, `#rrggbb`, `#rrggbbaa` or a basic CSS colour name.
 * Returns undefined for anything else.
 */
export function parseColor(value: string): Rgba | undefined {
  const trimmed = value.trim().toLowerCase();
  const named = NAMED_COLORS[trimmed];
  if (named) return { ...named };

  const match = HEX_COLOR.exec(trimmed);
  if (!match) return undefined;

  let hex = match[1];
  if (hex.length === 3) {
    hex = hex
      .split('')
      .map((digit) => digit + digit)
      .join('');
  }

  const channel = (offset: number) => parseInt(hex.slice(offset, offset + 2), 16);
  return {
    r: channel(0),
    g: channel(2),
    b: channel(4),
    alpha: hex.length === 8 ? Math.round((channel(6) / 255) * 1000) / 1000 : 1,
  };
}

export function toSvgFill(color: Rgba): string {
  return `fill="rgb(${color.r},${color.g},${color.b})" fill-opacity="${color.alpha}"`;
}
