import { writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { NotFoundError, ProcessingError, ValidationError, wrapError } from '../errors';
import { getLogger } from '../logger';
import { imagesToPdfRequestSchema, parseRequest, rotationPairSchema } from '../schemas';
import { pathExists } from './discover';
import { silentProgress } from './progress';
import type { DocumentResult, EngineOptions, ImagesToPdfRequest, RotationSpec } from '../types';

export interface NormalizedImage {
  data: Buffer;
  width: number;
  height: number;
  channels: number;
}

/**
 * Build a rotation map from (index, angle) pairs. A repeated index keeps
 * the last angle given for it.
 */
export function buildRotationSpec(pairs: ReadonlyArray<readonly [number, number]>): RotationSpec {
  const spec = new Map<number, number>();
  for (const pair of pairs) {
    const [index, angle] = parseRotationPair(pair);
    spec.set(index, angle);
  }
  return spec;
}

function parseRotationPair(pair: readonly [number, number]): [number, number] {
  const result = rotationPairSchema.safeParse(pair);
  if (!result.success) {
    throw new ValidationError(`Invalid rotation ${pair.join(',')}: ${result.error.issues[0].message}`, 'rotations');
  }
  return result.data;
}

/**
 * Decode an image, rotate it counterclockwise by `angle` degrees (canvas grows
 * to fit, new corners filled black) and flatten it to 8-bit, 3-channel sRGB.
 * Alpha is dropped, not composited.
 */
export async function normalizeImage(path: string, angle?: number): Promise<NormalizedImage> {
  let pipeline = sharp(path);
  if (angle !== undefined && angle % 360 !== 0) {
    // sharp rotates clockwise
    pipeline = pipeline.rotate(-angle, { background: { r: 0, g: 0, b: 0, alpha: 1 } });
  }

  const { data, info } = await pipeline
    .removeAlpha()
    .toColourspace('srgb')
    .png()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: info.channels };
}

/**
 * Convert images into one PDF, one page per image, in input order.
 *
 * Each page is the image's pixel size in points. Like merge, the call is
 * all-or-nothing: a missing or undecodable image aborts it before anything
 * is written.
 */
export async function imagesToPdf(
  request: ImagesToPdfRequest,
  options: EngineOptions = {}
): Promise<DocumentResult> {
  const { images, rotations, outputPath } = parseRequest(imagesToPdfRequestSchema, request, 'image-to-pdf');
  const progress = options.progress ?? silentProgress;
  const logger = getLogger();

  if (images.length === 0) {
    return { outputPath: null, pageCount: 0, message: 'No images to convert.' };
  }

  const missing: string[] = [];
  for (const image of images) {
    if (!(await pathExists(image))) missing.push(image);
  }
  if (missing.length > 0) {
    throw new NotFoundError(missing, 'Image');
  }

  const normalized: NormalizedImage[] = [];
  progress.start(images.length, 'Converting images to PDF');
  try {
    for (let i = 0; i < images.length; i++) {
      const angle = rotations.get(i);
      try {
        normalized.push(await normalizeImage(images[i], angle));
      } catch (err) {
        throw wrapError(err, ProcessingError, `Failed to read image ${basename(images[i])}`);
      }
      logger.debug('Image prepared', { operation: 'image-to-pdf', file: images[i], rotation: angle ?? 0 });
      progress.advance(1);
    }
  } finally {
    progress.close();
  }

  try {
    const doc = await PDFDocument.create();
    for (const image of normalized) {
      const embedded = await doc.embedPng(image.data);
      const page = doc.addPage([image.width, image.height]);
      page.drawImage(embedded, { x: 0, y: 0, width: image.width, height: image.height });
    }
    await writeFile(outputPath, await doc.save());
  } catch (err) {
    throw wrapError(err, ProcessingError, `Failed to write ${outputPath}`);
  }

  logger.info('Images converted', { operation: 'image-to-pdf', outputPath, pages: normalized.length });
  return {
    outputPath,
    pageCount: normalized.length,
    message: `Created ${outputPath} from ${normalized.length} image(s)`,
  };
}
