/**
 * Zod schemas for engine requests.
 * Engines parse their request first so invalid options fail before any file is touched.
 */

import { z } from 'zod';
import {
  COMPRESSION_DEFAULTS,
  COMPRESSION_QUALITIES,
  DEFAULT_PAGE_SIZE,
  IMAGE_FORMATS,
  RENDER_DEFAULTS,
} from './config/constants';
import { ValidationError } from './errors';

const pathSchema = z.string().min(1, 'path must not be empty');

export const pageSizeSchema = z.object({
  width: z.number().finite().positive(),
  height: z.number().finite().positive(),
});

export const qualitySchema = z.enum(COMPRESSION_QUALITIES);

export const imageFormatSchema = z.enum(IMAGE_FORMATS);

export const dpiSchema = z.number().int().positive();

export const rotationPairSchema = z.tuple([
  z.number().int().nonnegative(),
  z.number().finite(),
]);

export const mergeRequestSchema = z.object({
  files: z.array(pathSchema),
  outputPath: pathSchema,
  pageSize: pageSizeSchema.default(DEFAULT_PAGE_SIZE),
});

export const compressRequestSchema = z.object({
  inputPath: pathSchema,
  outputPath: z.string().optional(),
  quality: qualitySchema.default(COMPRESSION_DEFAULTS.QUALITY),
});

export const imagesToPdfRequestSchema = z.object({
  images: z.array(pathSchema),
  rotations: z.map(z.number().int().nonnegative(), z.number().finite()).default(new Map()),
  outputPath: pathSchema,
});

export const pdfToImagesRequestSchema = z.object({
  pdfPaths: z.array(pathSchema),
  outputFolder: z.string().optional(),
  dpi: dpiSchema.default(RENDER_DEFAULTS.DPI),
  format: imageFormatSchema.default(RENDER_DEFAULTS.FORMAT),
});

/**
 * Parse `input` with `schema`, raising ValidationError on the first issue.
 */
export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  operation: string
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw new ValidationError(
      `Invalid ${operation} request${field ? ` (${field})` : ''}: ${issue.message}`,
      field || undefined,
      { issues: result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) }
    );
  }
  return result.data;
}
