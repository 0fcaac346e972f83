/**
 * Local file helpers shared by the storage backends.
 */

import { rename, rm, stat } from 'fs/promises';
import { isNotFoundError } from '../../core/errors.js';

/**
 * Unique temp name on the same volume as `path`, so a rename onto it is atomic
 */
export function temporarySibling(path: string): string {
  return `${path}.tmp-${Date.now()}-${Math.random().toString(36).slice(2)}`;
}

/**
 * Run `write` against a temp sibling, then rename it onto `path`.
 * Readers never see a partial file at `path`; the temp file is removed when the write fails.
 */
export async function writeAtomically(path: string, write: (tempPath: string) => Promise<void>): Promise<void> {
  const tempPath = temporarySibling(path);
  try {
    await write(tempPath);
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * True only for a regular file; a directory at `path` does not count
 */
export async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    if (isNotFoundError(error)) {
      return false;
    }
    throw error;
  }
}
