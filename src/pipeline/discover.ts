import { readdir, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';

export const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg', '.tiff', '.tif', '.webp', '.gif']);

export function naturalSort(a: string, b: string): number {
  return a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export function isImageFile(path: string): boolean {
  const ext = extname(path).toLowerCase();
  return IMAGE_EXTENSIONS.has(ext);
}

export function isPdfName(path: string): boolean {
  return extname(path).toLowerCase() === '.pdf';
}

async function walkFiles(root: string, match: (name: string) => boolean): Promise<string[]> {
  const found: string[] = [];

  async function walk(dir: string): Promise<void> {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && match(entry.name)) {
        found.push(fullPath);
      }
    }
  }

  await walk(root);
  return found.sort(naturalSort);
}

/**
 * Recursively list regular files under `root` whose name ends with `ext`.
 * The match is case-sensitive, like a shell glob.
 */
export function findFiles(root: string, ext: string): Promise<string[]> {
  return walkFiles(root, (name) => name.endsWith(ext));
}

/**
 * Expand CLI arguments: directories become the matching files beneath them,
 * everything else is passed through in order.
 */
export async function expandInputs(
  inputs: readonly string[],
  match: (name: string) => boolean
): Promise<string[]> {
  const expanded: string[] = [];
  for (const input of inputs) {
    const stats = await stat(input).catch(() => null);
    if (stats?.isDirectory()) {
      expanded.push(...(await walkFiles(input, match)));
    } else {
      expanded.push(input);
    }
  }
  return expanded;
}
