import type { COMPRESSION_QUALITIES, IMAGE_FORMATS } from './config/constants';
import type { ProgressSink } from './pipeline/progress';

/** Page dimensions in points (1/72 inch) */
export interface PageSize {
  width: number;
  height: number;
}

export type CompressionQuality = (typeof COMPRESSION_QUALITIES)[number];

export type ImageFormat = (typeof IMAGE_FORMATS)[number];

/** Zero-based image index -> counterclockwise angle in degrees */
export type RotationSpec = ReadonlyMap<number, number>;

export interface MergeRequest {
  readonly files: readonly string[];
  readonly outputPath: string;
  readonly pageSize: PageSize;
}

export interface CompressRequest {
  readonly inputPath: string;
  /** Derived as `<stem>_compressed<ext>` beside the input when omitted or empty */
  readonly outputPath?: string;
  readonly quality: CompressionQuality;
}

export interface ImagesToPdfRequest {
  readonly images: readonly string[];
  readonly rotations: RotationSpec;
  readonly outputPath: string;
}

export interface PdfToImagesRequest {
  readonly pdfPaths: readonly string[];
  /** Each PDF gets `<stem>_images` below this folder, or beside itself when unset */
  readonly outputFolder?: string;
  readonly dpi: number;
  readonly format: ImageFormat;
}

export interface EngineOptions {
  progress?: ProgressSink;
}

/** Result of an operation producing a single document */
export interface DocumentResult {
  /** null when there was nothing to write */
  outputPath: string | null;
  pageCount: number;
  message: string;
}

export interface SourceError {
  source: string;
  error: string;
}

export interface PdfToImagesResult {
  /** Generated image paths per source PDF, in input order */
  images: Record<string, string[]>;
  errors: SourceError[];
  message: string;
}

export interface CompressionOutcome {
  success: boolean;
  /** Percentage size reduction; exactly 0 when `success` is false */
  compressionRatio: number;
  message: string;
  outputPath?: string;
  originalSize?: number;
  compressedSize?: number;
}

export interface PdfInfo {
  pageCount: number;
}

export interface RenameEntry {
  from: string;
  to: string;
  applied: boolean;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}
