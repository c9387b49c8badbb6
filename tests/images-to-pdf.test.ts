import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PDFDocument } from 'pdf-lib';
import sharp from 'sharp';
import { buildRotationSpec, imagesToPdf, normalizeImage } from '../src/pipeline/images-to-pdf';
import { pathExists } from '../src/pipeline/discover';
import { NotFoundError, ProcessingError, ValidationError } from '../src/errors';
import { createProgressRecorder, createTempDir, removeTempDir, writeSolidImage } from './helpers';

describe('buildRotationSpec', () => {
  it('should map indices to angles', () => {
    const spec = buildRotationSpec([[0, 90], [2, -45]]);

    expect(spec.get(0)).toBe(90);
    expect(spec.get(1)).toBeUndefined();
    expect(spec.get(2)).toBe(-45);
  });

  it('should keep the last angle for a repeated index', () => {
    const spec = buildRotationSpec([[1, 90], [1, 180]]);

    expect(spec.size).toBe(1);
    expect(spec.get(1)).toBe(180);
  });

  it('should reject a negative index', () => {
    expect(() => buildRotationSpec([[-1, 90]])).toThrow(ValidationError);
  });
});

describe('normalizeImage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should drop alpha and produce three channels', async () => {
    const path = join(dir, 'alpha.png');
    await writeSolidImage(path, 8, 4, 4);

    const image = await normalizeImage(path);

    expect(image.channels).toBe(3);
    const meta = await sharp(image.data).metadata();
    expect(meta.channels).toBe(3);
    expect(meta.hasAlpha).toBe(false);
    expect(meta.space).toBe('srgb');
  });

  it('should convert a greyscale image to RGB', async () => {
    const path = join(dir, 'grey.png');
    await sharp({ create: { width: 6, height: 6, channels: 3, background: { r: 90, g: 90, b: 90 } } })
      .toColourspace('b-w')
      .png()
      .toFile(path);

    const image = await normalizeImage(path);

    expect(image.channels).toBe(3);
  });

  it('should convert a palette image to RGB', async () => {
    const path = join(dir, 'palette.png');
    await sharp({ create: { width: 6, height: 6, channels: 3, background: { r: 255, g: 0, b: 0 } } })
      .png({ palette: true })
      .toFile(path);

    const image = await normalizeImage(path);

    expect(image.channels).toBe(3);
  });

  it('should rotate counterclockwise', async () => {
    // red on the left, blue on the right
    const path = join(dir, 'pair.png');
    await sharp(Buffer.from([255, 0, 0, 0, 0, 255]), { raw: { width: 2, height: 1, channels: 3 } })
      .png()
      .toFile(path);

    const image = await normalizeImage(path, 90);

    expect(image.width).toBe(1);
    expect(image.height).toBe(2);
    const pixels = await sharp(image.data).raw().toBuffer();
    // the right edge moves to the top
    expect([...pixels]).toEqual([0, 0, 255, 255, 0, 0]);
  });

  it('should expand the canvas for non-right angles', async () => {
    const path = join(dir, 'wide.png');
    await writeSolidImage(path, 40, 20);

    const image = await normalizeImage(path, 45);

    expect(image.width).toBeGreaterThan(40);
    expect(image.height).toBeGreaterThan(20);
  });

  it('should leave the image alone for a full turn', async () => {
    const path = join(dir, 'wide.png');
    await writeSolidImage(path, 40, 20);

    const image = await normalizeImage(path, 360);

    expect(image.width).toBe(40);
    expect(image.height).toBe(20);
  });
});

describe('imagesToPdf', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should write one page per image at pixel size, applying rotations', async () => {
    const images = [join(dir, '1.png'), join(dir, '2.png'), join(dir, '3.png')];
    await writeSolidImage(images[0], 40, 20);
    await writeSolidImage(images[1], 30, 30, 4);
    await writeSolidImage(images[2], 10, 50);
    const output = join(dir, 'out.pdf');

    const result = await imagesToPdf({
      images,
      rotations: buildRotationSpec([[0, 90], [2, 180]]),
      outputPath: output,
    });

    expect(result).toEqual({
      outputPath: output,
      pageCount: 3,
      message: `Created ${output} from 3 image(s)`,
    });

    const doc = await PDFDocument.load(await readFile(output));
    expect(doc.getPages().map((page) => page.getSize())).toEqual([
      { width: 20, height: 40 },
      { width: 30, height: 30 },
      { width: 10, height: 50 },
    ]);
  });

  it('should tick progress once per image', async () => {
    const images = [join(dir, 'a.png'), join(dir, 'b.png')];
    await writeSolidImage(images[0], 5, 5);
    await writeSolidImage(images[1], 5, 5);
    const progress = createProgressRecorder();

    await imagesToPdf({ images, rotations: new Map(), outputPath: join(dir, 'out.pdf') }, { progress });

    expect(progress.starts).toEqual([{ total: 2, label: 'Converting images to PDF' }]);
    expect(progress.advances).toEqual([1, 1]);
    expect(progress.closes).toBe(1);
  });

  it('should be a no-op for an empty list', async () => {
    const output = join(dir, 'none.pdf');

    const result = await imagesToPdf({ images: [], rotations: new Map(), outputPath: output });

    expect(result).toEqual({ outputPath: null, pageCount: 0, message: 'No images to convert.' });
    expect(await pathExists(output)).toBe(false);
  });

  it('should reject missing images without writing output', async () => {
    const present = join(dir, 'here.png');
    await writeSolidImage(present, 5, 5);
    const missing = join(dir, 'nowhere.png');
    const output = join(dir, 'out.pdf');

    const error = await imagesToPdf({ images: [present, missing], rotations: new Map(), outputPath: output })
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({ paths: [missing] });
    expect(await pathExists(output)).toBe(false);
  });

  it('should abort on an undecodable image', async () => {
    const good = join(dir, 'good.png');
    const bad = join(dir, 'bad.png');
    await writeSolidImage(good, 5, 5);
    await writeFile(bad, 'not an image');
    const output = join(dir, 'out.pdf');

    await expect(
      imagesToPdf({ images: [good, bad], rotations: new Map(), outputPath: output })
    ).rejects.toThrow(ProcessingError);
    expect(await pathExists(output)).toBe(false);
  });
});
