import { join, basename, dirname, extname } from 'node:path';
import { mkdir, rename, unlink } from 'node:fs/promises';
import sharp from 'sharp';
import { RENDER_DEFAULTS } from '../config/constants';
import { getConfig } from '../config/env';
import { ProcessingError, errorMessage } from '../errors';
import { getLogger } from '../logger';
import { parseRequest, pdfToImagesRequestSchema } from '../schemas';
import { pathExists } from './discover';
import { exec, execOrThrow } from './exec';
import { silentProgress, type ProgressSink } from './progress';
import type {
  EngineOptions,
  ImageFormat,
  PdfInfo,
  PdfToImagesRequest,
  PdfToImagesResult,
  SourceError,
} from '../types';

interface RenderTarget {
  /** pdftoppm output flag */
  flag: '-png' | '-jpeg' | '-tiff';
  /** Extension pdftoppm gives a -singlefile output */
  nativeExt: string;
  /** Re-encode with sharp after rendering */
  transcode?: 'webp';
}

const RENDER_TARGETS: Record<ImageFormat, RenderTarget> = {
  png: { flag: '-png', nativeExt: 'png' },
  jpg: { flag: '-jpeg', nativeExt: 'jpg' },
  jpeg: { flag: '-jpeg', nativeExt: 'jpg' },
  tiff: { flag: '-tiff', nativeExt: 'tif' },
  webp: { flag: '-png', nativeExt: 'png', transcode: 'webp' },
};

export async function getPdfInfo(pdfPath: string): Promise<PdfInfo> {
  const result = await exec([getConfig().tools.pdfinfo, pdfPath]);
  if (result.exitCode !== 0) {
    throw new ProcessingError(`pdfinfo failed for ${basename(pdfPath)}: ${result.stderr.trim()}`);
  }

  const pagesMatch = result.stdout.match(/Pages:\s*(\d+)/);
  if (!pagesMatch) {
    throw new ProcessingError('Could not determine PDF page count');
  }
  return { pageCount: parseInt(pagesMatch[1], 10) };
}

/**
 * `<outputFolder>/<stem>_images`, or `<stem>_images` beside the PDF.
 */
export function imageFolderFor(pdfPath: string, outputFolder?: string): string {
  const stem = basename(pdfPath, extname(pdfPath));
  return join(outputFolder || dirname(pdfPath), `${stem}_images`);
}

async function renderPage(
  pdfPath: string,
  folder: string,
  page: number,
  dpi: number,
  format: ImageFormat
): Promise<string> {
  const target = RENDER_TARGETS[format];
  const prefix = join(folder, `page_${page}`);
  const finalPath = `${prefix}.${format}`;

  await execOrThrow(
    [
      getConfig().tools.pdftoppm,
      target.flag,
      '-r', String(dpi),
      '-f', String(page),
      '-l', String(page),
      '-singlefile',
      pdfPath,
      prefix,
    ],
    { timeout: RENDER_DEFAULTS.PAGE_TIMEOUT_MS }
  );

  const renderedPath = `${prefix}.${target.nativeExt}`;
  if (target.transcode) {
    await sharp(renderedPath).toFormat(target.transcode).toFile(finalPath);
    await unlink(renderedPath);
  } else if (renderedPath !== finalPath) {
    await rename(renderedPath, finalPath);
  }
  return finalPath;
}

async function renderPdf(
  pdfPath: string,
  folder: string,
  dpi: number,
  format: ImageFormat,
  progress: ProgressSink
): Promise<string[]> {
  await mkdir(folder, { recursive: true });
  const { pageCount } = await getPdfInfo(pdfPath);

  const paths: string[] = [];
  progress.start(pageCount, `Rendering ${basename(pdfPath)}`);
  try {
    for (let page = 1; page <= pageCount; page++) {
      paths.push(await renderPage(pdfPath, folder, page, dpi, format));
      progress.advance(1);
    }
  } finally {
    progress.close();
  }
  return paths;
}

/**
 * Rasterize every page of every PDF. Sources are independent: a missing or
 * broken PDF is recorded with an empty list and the batch carries on.
 */
export async function pdfToImages(
  request: PdfToImagesRequest,
  options: EngineOptions = {}
): Promise<PdfToImagesResult> {
  const { pdfPaths, outputFolder, dpi, format } = parseRequest(pdfToImagesRequestSchema, request, 'pdf-to-image');
  const progress = options.progress ?? silentProgress;
  const logger = getLogger();

  const images: Record<string, string[]> = {};
  const errors: SourceError[] = [];

  for (const pdfPath of pdfPaths) {
    if (!(await pathExists(pdfPath))) {
      logger.warn('PDF not found, skipping', { operation: 'pdf-to-image', file: pdfPath });
      images[pdfPath] = [];
      errors.push({ source: pdfPath, error: 'file not found' });
      continue;
    }

    try {
      const folder = imageFolderFor(pdfPath, outputFolder);
      images[pdfPath] = await renderPdf(pdfPath, folder, dpi, format, progress);
      logger.info('PDF rendered', {
        operation: 'pdf-to-image',
        file: pdfPath,
        folder,
        pages: images[pdfPath].length,
      });
    } catch (err) {
      logger.error('PDF conversion failed', { operation: 'pdf-to-image', file: pdfPath, error: errorMessage(err) });
      images[pdfPath] = [];
      errors.push({ source: pdfPath, error: errorMessage(err) });
    }
  }

  const total = Object.values(images).reduce((sum, list) => sum + list.length, 0);
  const converted = pdfPaths.length - errors.length;
  const failedNote = errors.length > 0 ? `, ${errors.length} failed` : '';
  return {
    images,
    errors,
    message: `Converted ${converted} PDF(s) to ${total} ${format.toUpperCase()} image(s)${failedNote}`,
  };
}
