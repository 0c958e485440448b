/**
 * File Loader
 *
 * Turns files on disk into content units: an image file becomes an
 * image-only unit, a text or Markdown file a native-text unit. One unit per
 * file, positions in argument order.
 */

import fs from 'fs/promises';
import path from 'path';
import type { ContentUnit } from '../content/types.js';
import { NotFoundError, UnsupportedInputError } from '../errors/docfusion-error.js';

export const IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg', '.gif', '.webp', '.tif', '.tiff'];
export const TEXT_EXTENSIONS: readonly string[] = ['.txt', '.md'];

export type InputKind = 'image' | 'text';

export function inputKindOf(filePath: string): InputKind | undefined {
  const ext = path.extname(filePath).toLowerCase();
  if (IMAGE_EXTENSIONS.includes(ext)) return 'image';
  if (TEXT_EXTENSIONS.includes(ext)) return 'text';
  return undefined;
}

export async function loadUnitFromFile(filePath: string, position: number): Promise<ContentUnit> {
  const kind = inputKindOf(filePath);
  if (!kind) {
    throw new UnsupportedInputError(
      `Unsupported file type: ${filePath} (expected ${[...IMAGE_EXTENSIONS, ...TEXT_EXTENSIONS].join(', ')})`,
      { filePath }
    );
  }

  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new NotFoundError(`File not found: ${filePath}`, { filePath });
    }
    throw err;
  }

  const base = {
    id: `${position + 1}:${path.basename(filePath)}`,
    position,
    source: filePath,
  };

  if (kind === 'image') {
    return { ...base, nativeText: '', images: [new Uint8Array(data)] };
  }
  return { ...base, nativeText: data.toString('utf-8'), images: [] };
}

export async function loadUnitsFromFiles(paths: readonly string[]): Promise<ContentUnit[]> {
  return Promise.all(paths.map((filePath, index) => loadUnitFromFile(filePath, index)));
}
