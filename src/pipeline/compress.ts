import { stat } from 'node:fs/promises';
import { basename, dirname, extname, join, resolve } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { COMPRESSION_DEFAULTS } from '../config/constants';
import { getConfig } from '../config/env';
import { errorMessage } from '../errors';
import { getLogger } from '../logger';
import { compressRequestSchema, parseRequest } from '../schemas';
import { start, type RunningProcess } from './exec';
import { silentProgress } from './progress';
import type { CompressRequest, CompressionOutcome, CompressionQuality, EngineOptions, ExecResult } from '../types';

export interface CompressOptions extends EngineOptions {
  pollIntervalMs?: number;
}

export type CompressionState = 'starting' | 'running' | 'finalizing' | 'done' | 'failed';

/**
 * Heuristic progress for a Ghostscript run, driven by poll observations.
 *
 * starting -> running once the output has bytes; either -> finalizing when
 * the process exits; finalizing -> done | failed. The percentage never
 * decreases and only reaches 100 once the process has exited.
 */
export class CompressionTracker {
  private current: CompressionState = 'starting';
  private percentValue = 0;

  constructor(private readonly inputSize: number) {}

  get state(): CompressionState {
    return this.current;
  }

  get percent(): number {
    return this.percentValue;
  }

  /**
   * Record a poll. `outputSize` is null while the output file does not exist.
   * Returns the new percentage.
   */
  observe(elapsedMs: number, outputSize: number | null): number {
    if (this.current !== 'starting' && this.current !== 'running') {
      return this.percentValue;
    }

    let estimate: number;
    if (outputSize !== null && outputSize > 0) {
      this.current = 'running';
      const expected = this.inputSize * COMPRESSION_DEFAULTS.EXPECTED_RATIO;
      estimate = expected > 0
        ? Math.min(COMPRESSION_DEFAULTS.RUNNING_CAP, (outputSize / expected) * 100)
        : COMPRESSION_DEFAULTS.RUNNING_CAP;
    } else {
      estimate = Math.min(
        COMPRESSION_DEFAULTS.STARTUP_CAP,
        (elapsedMs / 1000) * COMPRESSION_DEFAULTS.STARTUP_RATE
      );
    }

    this.percentValue = Math.max(this.percentValue, estimate);
    return this.percentValue;
  }

  exited(): number {
    if (this.current === 'starting' || this.current === 'running') {
      this.current = 'finalizing';
      this.percentValue = 100;
    }
    return this.percentValue;
  }

  complete(success: boolean): void {
    this.current = success ? 'done' : 'failed';
  }
}

export function defaultCompressedPath(inputPath: string): string {
  const ext = extname(inputPath);
  return join(dirname(inputPath), `${basename(inputPath, ext)}_compressed${ext}`);
}

export function ghostscriptArgs(
  inputPath: string,
  outputPath: string,
  quality: CompressionQuality
): string[] {
  return [
    '-sDEVICE=pdfwrite',
    '-dCompatibilityLevel=1.4',
    `-dPDFSETTINGS=/${quality}`,
    '-dNOPAUSE',
    '-dBATCH',
    '-dQUIET',
    '-dAutoRotatePages=/None',
    '-dColorImageDownsampleType=/Bicubic',
    '-dGrayImageDownsampleType=/Bicubic',
    '-dMonoImageDownsampleType=/Subsample',
    '-dEmbedAllFonts=true',
    '-dSubsetFonts=true',
    `-sOutputFile=${outputPath}`,
    inputPath,
  ];
}

function failure(message: string, outputPath?: string): CompressionOutcome {
  return { success: false, compressionRatio: 0, message, outputPath };
}

async function fileSize(path: string): Promise<number | null> {
  try {
    return (await stat(path)).size;
  } catch {
    return null;
  }
}

function formatMb(bytes: number): string {
  return `${(bytes / 1024 / 1024).toFixed(2)} MB`;
}

/**
 * Wait for `proc`, calling `onTick` every `intervalMs` while it is still running.
 */
async function waitWithPolling(
  proc: RunningProcess,
  intervalMs: number,
  onTick: () => Promise<void>
): Promise<ExecResult> {
  for (;;) {
    const settled = await Promise.race([
      proc.exited.then((result) => ({ done: true as const, result })),
      sleep(intervalMs).then(() => ({ done: false as const })),
    ]);
    if (settled.done) {
      return settled.result;
    }
    await onTick();
  }
}

/**
 * Compress a PDF with Ghostscript. Never throws: every failure is reported
 * through the outcome's `success` flag.
 */
export async function compressPdf(
  request: CompressRequest,
  options: CompressOptions = {}
): Promise<CompressionOutcome> {
  const logger = getLogger();
  const progress = options.progress ?? silentProgress;
  const pollIntervalMs = options.pollIntervalMs ?? COMPRESSION_DEFAULTS.POLL_INTERVAL_MS;

  let parsed: CompressRequest;
  try {
    parsed = parseRequest(compressRequestSchema, request, 'compress');
  } catch (err) {
    return failure(errorMessage(err));
  }

  const { inputPath, quality } = parsed;
  const originalSize = await fileSize(inputPath);
  if (originalSize === null) {
    return failure(`Input file does not exist: ${inputPath}`);
  }

  const outputPath = parsed.outputPath || defaultCompressedPath(inputPath);
  if (resolve(outputPath) === resolve(inputPath)) {
    return failure(`Output path must differ from the input: ${outputPath}`);
  }

  const tracker = new CompressionTracker(originalSize);
  const startedAt = Date.now();
  let reported = 0;
  const report = (percent: number): void => {
    const delta = Math.floor(percent) - reported;
    if (delta > 0) {
      progress.advance(delta);
      reported += delta;
    }
  };

  progress.start(100, `Compressing ${basename(inputPath)}`);
  try {
    const cmd = [getConfig().tools.ghostscript, ...ghostscriptArgs(inputPath, outputPath, quality)];
    logger.debug('Starting Ghostscript', { operation: 'compress', file: inputPath, quality });

    const proc = start(cmd);
    const result = await waitWithPolling(proc, pollIntervalMs, async () => {
      report(tracker.observe(Date.now() - startedAt, await fileSize(outputPath)));
    });
    report(tracker.exited());

    if (result.exitCode !== 0) {
      tracker.complete(false);
      logger.error('Ghostscript failed', { operation: 'compress', file: inputPath, exitCode: result.exitCode });
      return failure(`Ghostscript exited with code ${result.exitCode}: ${result.stderr.trim()}`, outputPath);
    }

    const compressedSize = await fileSize(outputPath);
    if (compressedSize === null) {
      tracker.complete(false);
      return failure(`Ghostscript produced no output at ${outputPath}`, outputPath);
    }
    tracker.complete(true);

    const reduction = originalSize > 0 ? ((originalSize - compressedSize) / originalSize) * 100 : 0;
    const compressionRatio = Math.min(100, Math.max(0, reduction));
    const elapsed = ((Date.now() - startedAt) / 1000).toFixed(2);
    logger.info('Compression complete', {
      operation: 'compress',
      file: inputPath,
      outputPath,
      originalSize,
      compressedSize,
    });

    return {
      success: true,
      compressionRatio,
      message: `Compressed ${formatMb(originalSize)} -> ${formatMb(compressedSize)} (${compressionRatio.toFixed(1)}% smaller) in ${elapsed}s: ${outputPath}`,
      outputPath,
      originalSize,
      compressedSize,
    };
  } catch (err) {
    tracker.complete(false);
    logger.error('Compression failed', { operation: 'compress', file: inputPath, error: errorMessage(err) });
    return failure(`Compression failed: ${errorMessage(err)}`, outputPath);
  } finally {
    progress.close();
  }
}
