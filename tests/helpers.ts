import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PDFDocument, rgb } from 'pdf-lib';
import sharp from 'sharp';
import type { ProgressSink } from '../src/pipeline/progress';

export interface ProgressRecorder extends ProgressSink {
  starts: Array<{ total: number; label: string }>;
  advances: number[];
  closes: number;
  /** Sum of every advance */
  readonly advanced: number;
}

export function createProgressRecorder(): ProgressRecorder {
  const recorder: ProgressRecorder = {
    starts: [],
    advances: [],
    closes: 0,
    get advanced(): number {
      return recorder.advances.reduce((sum, n) => sum + n, 0);
    },
    start(total, label) {
      recorder.starts.push({ total, label });
    },
    advance(n) {
      recorder.advances.push(n);
    },
    close() {
      recorder.closes++;
    },
  };
  return recorder;
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'pdftools-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write a PDF with one page per size, each carrying a filled rectangle */
export async function writePdf(path: string, sizes: Array<[number, number]>): Promise<void> {
  const doc = await PDFDocument.create();
  for (const [width, height] of sizes) {
    const page = doc.addPage([width, height]);
    page.drawRectangle({ x: 10, y: 10, width: width / 2, height: height / 2, color: rgb(0.2, 0.4, 0.6) });
  }
  await writeFile(path, await doc.save());
}

export async function writeSolidImage(
  path: string,
  width: number,
  height: number,
  channels: 3 | 4 = 3
): Promise<void> {
  const background = channels === 4
    ? { r: 200, g: 100, b: 50, alpha: 0.5 }
    : { r: 200, g: 100, b: 50 };
  await sharp({ create: { width, height, channels, background } }).png().toFile(path);
}
