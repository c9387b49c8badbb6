export { mergePdfs } from './pipeline/merge';
export {
  compressPdf,
  CompressionTracker,
  defaultCompressedPath,
  ghostscriptArgs,
  type CompressOptions,
  type CompressionState,
} from './pipeline/compress';
export { imagesToPdf, normalizeImage, buildRotationSpec, type NormalizedImage } from './pipeline/images-to-pdf';
export { pdfToImages, getPdfInfo, imageFolderFor } from './pipeline/render-pdf';
export { renameDateRangeFiles, dateRangeName } from './pipeline/rename';
export { findFiles, expandInputs, isImageFile, isPdfName } from './pipeline/discover';
export { silentProgress, type ProgressSink } from './pipeline/progress';
export { OperationRunner } from './runner';
export { initLogger, getLogger, type Logger, type LogMeta } from './logger';
export { loadConfig, getConfig, type Config } from './config/env';
export { PAGE_SIZES, DEFAULT_PAGE_SIZE } from './config/constants';
export {
  PdfToolsError,
  NotFoundError,
  ProcessingError,
  ValidationError,
  ConfigurationError,
  OperationInProgressError,
  wrapError,
} from './errors';
export type * from './types';
