import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  expandInputs,
  findFiles,
  isImageFile,
  isPdfName,
  naturalSort,
  pathExists,
} from '../src/pipeline/discover';
import { createTempDir, removeTempDir } from './helpers';

describe('naturalSort', () => {
  it('should order numbered names numerically', () => {
    expect(['page10.png', 'page2.png', 'page1.png'].sort(naturalSort)).toEqual([
      'page1.png',
      'page2.png',
      'page10.png',
    ]);
  });
});

describe('isImageFile / isPdfName', () => {
  it('should match extensions case-insensitively', () => {
    expect(isImageFile('scan.JPG')).toBe(true);
    expect(isImageFile('scan.tif')).toBe(true);
    expect(isImageFile('notes.txt')).toBe(false);
    expect(isPdfName('Report.PDF')).toBe(true);
    expect(isPdfName('report.pdf.bak')).toBe(false);
  });
});

describe('findFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    await mkdir(join(dir, 'sub', 'deeper'), { recursive: true });
    await mkdir(join(dir, 'folder.pdf'));
    await writeFile(join(dir, 'a.pdf'), '');
    await writeFile(join(dir, 'B.PDF'), '');
    await writeFile(join(dir, 'notes.txt'), '');
    await writeFile(join(dir, 'sub', 'c.pdf'), '');
    await writeFile(join(dir, 'sub', 'deeper', 'd.pdf'), '');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should find matching files at every depth', async () => {
    const found = await findFiles(dir, '.pdf');

    expect(found).toEqual([
      join(dir, 'a.pdf'),
      join(dir, 'sub', 'c.pdf'),
      join(dir, 'sub', 'deeper', 'd.pdf'),
    ]);
  });

  it('should match the extension case-sensitively', async () => {
    expect(await findFiles(dir, '.PDF')).toEqual([join(dir, 'B.PDF')]);
  });

  it('should return nothing when no file matches', async () => {
    expect(await findFiles(dir, '.docx')).toEqual([]);
  });
});

describe('expandInputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
    await mkdir(join(dir, 'scans'));
    await writeFile(join(dir, 'scans', 'p10.png'), '');
    await writeFile(join(dir, 'scans', 'p2.jpg'), '');
    await writeFile(join(dir, 'scans', 'readme.md'), '');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should expand directories in place and pass files through', async () => {
    const single = join(dir, 'cover.png');
    const missing = join(dir, 'missing.png');

    const expanded = await expandInputs([single, join(dir, 'scans'), missing], isImageFile);

    expect(expanded).toEqual([single, join(dir, 'scans', 'p2.jpg'), join(dir, 'scans', 'p10.png'), missing]);
  });
});

describe('pathExists', () => {
  it('should report missing paths', async () => {
    expect(await pathExists(join(__dirname, 'definitely-not-here'))).toBe(false);
    expect(await pathExists(__dirname)).toBe(true);
  });
});
