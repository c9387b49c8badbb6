import { readdir, rename, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { NotFoundError } from '../errors';
import { getLogger } from '../logger';
import { pathExists } from './discover';
import type { RenameEntry } from '../types';

const DATE_RANGE = /(\d{4}-\d{2}-\d{2})__(\d{4}-\d{2}-\d{2})/;

/** `2024-01-01 ~ 2024-01-31.pdf` for names carrying `2024-01-01__2024-01-31`, else null */
export function dateRangeName(filename: string): string | null {
  if (!filename.endsWith('.pdf')) return null;
  const match = filename.match(DATE_RANGE);
  return match ? `${match[1]} ~ ${match[2]}.pdf` : null;
}

/**
 * Rename date-range PDFs directly inside `directory`. With `dryRun` the plan
 * is returned and nothing on disk changes.
 */
export async function renameDateRangeFiles(
  directory: string,
  options: { dryRun?: boolean } = {}
): Promise<RenameEntry[]> {
  const logger = getLogger();
  const stats = await stat(directory).catch(() => null);
  if (!stats?.isDirectory()) {
    throw new NotFoundError([directory], 'Directory');
  }

  const entries: RenameEntry[] = [];
  const names = (await readdir(directory)).sort();

  for (const name of names) {
    const target = dateRangeName(name);
    if (!target || target === name) continue;

    const from = join(directory, name);
    const to = join(directory, target);

    if (await pathExists(to)) {
      logger.warn('Rename target exists, skipping', { operation: 'rename', file: from, target: to });
      continue;
    }

    if (options.dryRun) {
      entries.push({ from, to, applied: false });
      continue;
    }

    await rename(from, to);
    logger.info('Renamed', { operation: 'rename', file: from, target: to });
    entries.push({ from, to, applied: true });
  }

  return entries;
}
