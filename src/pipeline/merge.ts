import { readFile, writeFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { PDFDocument, type PDFPage } from 'pdf-lib';
import { NotFoundError, ProcessingError, wrapError } from '../errors';
import { getLogger } from '../logger';
import { mergeRequestSchema, parseRequest } from '../schemas';
import { pathExists } from './discover';
import { silentProgress } from './progress';
import type { DocumentResult, EngineOptions, MergeRequest, PageSize } from '../types';

/**
 * Merge PDFs into one document, rescaling every page to `pageSize`.
 *
 * All inputs are checked up front; the output is written once, after every
 * page has been copied, so a failure leaves no partial file behind.
 */
export async function mergePdfs(
  request: MergeRequest,
  options: EngineOptions = {}
): Promise<DocumentResult> {
  const { files, outputPath, pageSize } = parseRequest(mergeRequestSchema, request, 'merge');
  const progress = options.progress ?? silentProgress;
  const logger = getLogger();

  if (files.length === 0) {
    return { outputPath: null, pageCount: 0, message: 'No PDF files to merge.' };
  }

  const missing: string[] = [];
  for (const file of files) {
    if (!(await pathExists(file))) missing.push(file);
  }
  if (missing.length > 0) {
    throw new NotFoundError(missing, 'PDF file');
  }

  const startedAt = Date.now();
  const merged = await PDFDocument.create();

  progress.start(files.length, 'Merging PDFs');
  try {
    for (const file of files) {
      logger.debug('Merging file', { operation: 'merge', file });
      await appendScaledPages(merged, file, pageSize);
      progress.advance(1);
    }
  } finally {
    progress.close();
  }

  try {
    const bytes = await merged.save();
    await writeFile(outputPath, bytes);
  } catch (err) {
    throw wrapError(err, ProcessingError, `Failed to write ${outputPath}`);
  }

  const pageCount = merged.getPageCount();
  const elapsed = ((Date.now() - startedAt) / 1000).toFixed(2);
  logger.info('Merge complete', { operation: 'merge', outputPath, pageCount, files: files.length });

  return {
    outputPath,
    pageCount,
    message: `Merged ${files.length} file(s) into ${outputPath}: ${pageCount} page(s) at ${pageSize.width}x${pageSize.height} pt in ${elapsed}s`,
  };
}

/**
 * Stretch the visible area (the CropBox, which falls back to the MediaBox)
 * to exactly `pageSize`. Content is scaled about the origin, so the box
 * origin is scaled with it, and every page box is reset to the new area.
 */
export function fitPageTo(page: PDFPage, pageSize: PageSize): void {
  const visible = page.getCropBox();
  const sx = pageSize.width / visible.width;
  const sy = pageSize.height / visible.height;

  page.scaleContent(sx, sy);
  page.scaleAnnotations(sx, sy);

  const x = visible.x * sx;
  const y = visible.y * sy;
  page.setMediaBox(x, y, pageSize.width, pageSize.height);
  page.setCropBox(x, y, pageSize.width, pageSize.height);
  page.setBleedBox(x, y, pageSize.width, pageSize.height);
  page.setTrimBox(x, y, pageSize.width, pageSize.height);
  page.setArtBox(x, y, pageSize.width, pageSize.height);
}

async function appendScaledPages(target: PDFDocument, file: string, pageSize: PageSize): Promise<void> {
  try {
    const source = await PDFDocument.load(await readFile(file));
    const pages = await target.copyPages(source, source.getPageIndices());
    for (const page of pages) {
      fitPageTo(page, pageSize);
      target.addPage(page);
    }
  } catch (err) {
    throw wrapError(err, ProcessingError, `Failed to merge ${basename(file)}`);
  }
}
