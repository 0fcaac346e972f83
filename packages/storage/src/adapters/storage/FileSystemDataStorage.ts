import { copyFile, mkdir } from 'fs/promises';
import { basename, join } from 'path';
import type { FetchFileOptions, IDataStorage } from './IDataStorage.js';
import { isRegularFile, writeAtomically } from './localFiles.js';

/**
 * Storage on a local or mounted filesystem.
 * Addresses are plain filesystem paths, e.g. the mount-form paths a PathFactory
 * with a prefix replacement produces.
 */
export class FileSystemDataStorage implements IDataStorage {
  readonly kind = 'fs' as const;

  /**
   * Copy `sourcePath` into `destinationDirectory` under the same file name.
   * A missing source rejects with ENOENT; write failures reject with the underlying error.
   */
  async fetchFile(sourcePath: string, destinationDirectory: string, options: FetchFileOptions = {}): Promise<string> {
    const destinationPath = join(destinationDirectory, basename(sourcePath));

    await mkdir(destinationDirectory, { recursive: true });

    if (options.skipIfPresent && await isRegularFile(destinationPath)) {
      console.log(`   ⏭️  Skipped copy of ${sourcePath} (already at ${destinationPath})`);
      return destinationPath;
    }

    await writeAtomically(destinationPath, (tempPath) => copyFile(sourcePath, tempPath));
    return destinationPath;
  }
}
