import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { dateRangeName, renameDateRangeFiles } from '../src/pipeline/rename';
import { NotFoundError } from '../src/errors';
import { createTempDir, removeTempDir } from './helpers';

describe('dateRangeName', () => {
  it('should rewrite a date-range PDF name', () => {
    expect(dateRangeName('statement_2024-01-01__2024-01-31_final.pdf')).toBe('2024-01-01 ~ 2024-01-31.pdf');
  });

  it('should ignore other files', () => {
    expect(dateRangeName('2024-01-01__2024-01-31.txt')).toBeNull();
    expect(dateRangeName('2024-01-01_2024-01-31.pdf')).toBeNull();
    expect(dateRangeName('invoice.pdf')).toBeNull();
  });
});

describe('renameDateRangeFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    await writeFile(join(dir, 'a_2024-01-01__2024-01-31.pdf'), '');
    await writeFile(join(dir, 'b_2024-02-01__2024-02-29.pdf'), '');
    await writeFile(join(dir, 'other.pdf'), '');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should rename matching files', async () => {
    const entries = await renameDateRangeFiles(dir);

    expect(entries).toEqual([
      { from: join(dir, 'a_2024-01-01__2024-01-31.pdf'), to: join(dir, '2024-01-01 ~ 2024-01-31.pdf'), applied: true },
      { from: join(dir, 'b_2024-02-01__2024-02-29.pdf'), to: join(dir, '2024-02-01 ~ 2024-02-29.pdf'), applied: true },
    ]);
    expect((await readdir(dir)).sort()).toEqual([
      '2024-01-01 ~ 2024-01-31.pdf',
      '2024-02-01 ~ 2024-02-29.pdf',
      'other.pdf',
    ]);
  });

  it('should leave the directory untouched on a dry run', async () => {
    const before = (await readdir(dir)).sort();

    const entries = await renameDateRangeFiles(dir, { dryRun: true });

    expect(entries.map((e) => e.applied)).toEqual([false, false]);
    expect((await readdir(dir)).sort()).toEqual(before);
  });

  it('should skip a file whose target already exists', async () => {
    await writeFile(join(dir, '2024-01-01 ~ 2024-01-31.pdf'), 'keep me');

    const entries = await renameDateRangeFiles(dir);

    expect(entries.map((e) => e.from)).toEqual([join(dir, 'b_2024-02-01__2024-02-29.pdf')]);
    expect(await readdir(dir)).toContain('a_2024-01-01__2024-01-31.pdf');
  });

  it('should reject a missing directory', async () => {
    await expect(renameDateRangeFiles(join(dir, 'nope'))).rejects.toThrow(NotFoundError);
  });
});
