/**
 * Core image pipeline types
 *
 * Everything that crosses a stage boundary (decode → transform → encode) is
 * described here. Stages never share a RasterImage: each one returns a fresh
 * buffer, so independent jobs can run side by side without aliasing.
 */

export const IMAGE_FORMATS = ['png', 'jpeg', 'webp', 'gif', 'tiff', 'avif'] as const;
export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/** Formats the encode stage can produce */
export const OUTPUT_FORMATS = ['png', 'jpeg', 'webp', 'tiff', 'avif'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/** Formats whose quality setting is meaningful */
export const LOSSY_FORMATS: ReadonlySet<ImageFormat> = new Set<ImageFormat>(['jpeg', 'webp', 'avif']);

export const CONTENT_TYPES: Record<ImageFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  gif: 'image/gif',
  tiff: 'image/tiff',
  avif: 'image/avif',
};

/**
 * Decoded pixel buffer, always 8-bit sRGB.
 * Invariant: data.length === width * height * channels.
 */
export interface RasterImage {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly data: Buffer;
}

export const RESIZE_FILTERS = ['nearest', 'bilinear', 'bicubic', 'lanczos'] as const;
export type ResizeFilter = (typeof RESIZE_FILTERS)[number];

/** RGBA colour, channels 0-255, alpha 0-1 */
export interface Rgba {
  r: number;
  g: number;
  b: number;
  alpha: number;
}

export interface ResizeOperation {
  type: 'resize';
  width: number;
  height: number;
  filter: ResizeFilter;
}

export interface CropOperation {
  type: 'crop';
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface RotateOperation {
  type: 'rotate';
  degrees: number;
  background?: Rgba;
}

export interface OverlayTextOperation {
  type: 'overlayText';
  text: string;
  fontId: string;
  size: number;
  x: number;
  y: number;
  color: Rgba;
}

export type Operation = ResizeOperation | CropOperation | RotateOperation | OverlayTextOperation;

export interface OutputSpec {
  format: OutputFormat;
  quality?: number;
}

export interface PipelineRequest {
  input: Buffer;
  /** Format the caller claims the input is in; must agree with the sniffed one */
  inputFormat?: ImageFormat;
  operations: readonly Operation[];
  output: OutputSpec;
}

export interface EncodedImage {
  data: Buffer;
  format: OutputFormat;
  contentType: string;
  width: number;
  height: number;
}

export interface PipelineLimits {
  maxDimension: number;
  defaultQuality: number;
}

export const DEFAULT_LIMITS: PipelineLimits = {
  maxDimension: 8192,
  defaultQuality: 80,
};

export function isImageFormat(value: string): value is ImageFormat {
  return (IMAGE_FORMATS as readonly string[]).includes(value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

/** Accepts the common aliases (jpg, tif) alongside canonical names */
export function normalizeFormat(value: string): ImageFormat | undefined {
  const lowered = value.trim().toLowerCase();
  const canonical = lowered === 'jpg' ? 'jpeg' : lowered === 'tif' ? 'tiff' : lowered;
  return isImageFormat(canonical) ? canonical : undefined;
}
