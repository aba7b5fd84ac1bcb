/**
 * Transform manifest: the wire contract of POST /v1/transform.
 *
 * The manifest travels as JSON in the X-Transform-Manifest header while the
 * request body carries the raw image bytes. This module validates the shape
 * only; geometric checks that need the image (crop bounds, canvas limits) and
 * font resolution happen in the transform stage.
 */

import { z } from 'zod';
import { InputError, OperationError } from '../core/image/errors';
import {
  RESIZE_FILTERS,
  isOutputFormat,
  normalizeFormat,
  type ImageFormat,
  type Operation,
  type PipelineRequest,
} from '../core/image/types';
import { parseColor } from '../processing/color';

export const MANIFEST_HEADER = 'x-transform-manifest';
export const MANIFEST_VERSION = 1;

const ColorSchema = z.string().transform((value, ctx) => {
  const color = parseColor(value);
  if (!color) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid color: ${value}` });
    return z.NEVER;
  }
  return color;
});

const OperationSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('resize'),
    width: z.number(),
    height: z.number(),
    filter: z.enum(RESIZE_FILTERS).default('lanczos'),
  }),
  z.object({
    type: z.literal('crop'),
    x: z.number(),
    y: z.number(),
    width: z.number(),
    height: z.number(),
  }),
  z.object({
    type: z.literal('rotate'),
    degrees: z.number(),
    background: ColorSchema.optional(),
  }),
  z.object({
    type: z.literal('overlayText'),
    text: z.string(),
    fontId: z.string().min(1),
    size: z.number(),
    x: z.number(),
    y: z.number(),
    color: ColorSchema.default('black'),
  }),
]);

const ManifestSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  input: z
    .object({
      format: z.string().min(1).optional(),
    })
    .optional(),
  operations: z.array(OperationSchema).default([]),
  output: z.object({
    format: z.string().min(1),
    quality: z.number().optional(),
  }),
});

export type Manifest = z.infer<typeof ManifestSchema>;

export interface ManifestLimits {
  maxOperations: number;
}

export function parseManifest(raw: unknown, limits: ManifestLimits): Manifest {
  const result = ManifestSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new OperationError(`Invalid manifest: ${issues.join('; ')}`, 'INVALID_MANIFEST', { issues });
  }

  const manifest = result.data;
  if (manifest.operations.length > limits.maxOperations) {
    throw new OperationError(
      `Too many operations: ${manifest.operations.length} (max ${limits.maxOperations})`,
      'INVALID_MANIFEST',
      { operations: manifest.operations.length, maxOperations: limits.maxOperations },
    );
  }
  return manifest;
}

/** Parse the header value; a missing or non-JSON header is an invalid manifest */
export function decodeManifestHeader(header: string | string[] | undefined, limits: ManifestLimits): Manifest {
  if (header === undefined || Array.isArray(header)) {
    throw new OperationError(
      `Expected exactly one ${MANIFEST_HEADER} header`,
      'INVALID_MANIFEST',
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(header);
  } catch (error) {
    throw new OperationError(`${MANIFEST_HEADER} is not valid JSON`, 'INVALID_MANIFEST', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  return parseManifest(raw, limits);
}

function declaredInputFormat(value: string | undefined): ImageFormat | undefined {
  if (value === undefined) return undefined;
  const format = normalizeFormat(value);
  if (!format) {
    throw new InputError(`Unsupported input format: ${value}`, 'UNSUPPORTED_FORMAT', { format: value });
  }
  return format;
}

/**
 * Build the pipeline request. `contentFormat` is the format implied by the
 * body's Content-Type, if any; it must agree with the manifest's input format.
 */
export function toPipelineRequest(input: Buffer, manifest: Manifest, contentFormat?: ImageFormat): PipelineRequest {
  const manifestFormat = declaredInputFormat(manifest.input?.format);
  if (manifestFormat && contentFormat && manifestFormat !== contentFormat) {
    throw new InputError(
      `Manifest input format ${manifestFormat} disagrees with Content-Type ${contentFormat}`,
      'FORMAT_MISMATCH',
      { manifest: manifestFormat, contentType: contentFormat },
    );
  }

  const outputFormat = normalizeFormat(manifest.output.format);
  if (!outputFormat || !isOutputFormat(outputFormat)) {
    throw new OperationError(`Unsupported output format: ${manifest.output.format}`, 'UNSUPPORTED_FORMAT', {
      format: manifest.output.format,
    });
  }

  const operations: Operation[] = manifest.operations;
  return {
    input,
    inputFormat: manifestFormat ?? contentFormat,
    operations,
    output: { format: outputFormat, quality: manifest.output.quality },
  };
}

/**
 * Map a Content-Type onto a declared format. Non-image types declare
 * nothing; an image type we cannot decode is an unsupported format.
 */
export function formatFromContentType(contentType: string | undefined): ImageFormat | undefined {
  if (!contentType) return undefined;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  if (!mime.startsWith('image/')) return undefined;

  const format = normalizeFormat(mime.slice('image/'.length));
  if (!format) {
    throw new InputError(`Unsupported Content-Type: ${mime}`, 'UNSUPPORTED_FORMAT', { contentType: mime });
  }
  return format;
}
