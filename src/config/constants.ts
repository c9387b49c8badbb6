/**
 * Tool defaults shared by the engines and the CLI.
 */

import type { PageSize } from '../types';

export const PAGE_SIZES = {
  a4: { width: 595.276, height: 841.89 },
  a3: { width: 841.89, height: 1190.551 },
  letter: { width: 612, height: 792 },
  legal: { width: 612, height: 1008 },
} as const satisfies Record<string, PageSize>;

export const DEFAULT_PAGE_SIZE: PageSize = PAGE_SIZES.a4;

export const COMPRESSION_QUALITIES = ['printer', 'ebook', 'screen', 'prepress'] as const;

export const IMAGE_FORMATS = ['png', 'jpg', 'jpeg', 'tiff', 'webp'] as const;

export const RENDER_DEFAULTS = {
  DPI: 200,
  MIN_DPI: 72,
  MAX_DPI: 1200,
  FORMAT: 'png',
  /** Per-page pdftoppm timeout */
  PAGE_TIMEOUT_MS: 600000,
} as const;

export const COMPRESSION_DEFAULTS = {
  QUALITY: 'printer',
  POLL_INTERVAL_MS: 100,
  /** Cap while Ghostscript has not written any output yet */
  STARTUP_CAP: 30,
  /** Percent per elapsed second during startup */
  STARTUP_RATE: 10,
  /** Cap while output is still growing */
  RUNNING_CAP: 95,
  /** Assumed compressed size as a fraction of the input */
  EXPECTED_RATIO: 0.5,
} as const;

export const CLI_DEFAULTS = {
  MERGE_OUTPUT: 'merged.pdf',
  IMAGE_PDF_OUTPUT: 'output.pdf',
} as const;
