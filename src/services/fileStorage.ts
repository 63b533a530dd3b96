/**
 * Stores uploaded document files on disk under the media root
 */

import fs from 'fs';
import { mkdir, open, rm, stat } from 'fs/promises';
import path from 'path';
import { Settings } from '../config/settings.js';
import { createLogger } from '../utils/loggingConfig.js';

const logger = createLogger('file-storage');

const DOCUMENTS_DIR = 'documents';
const ROOT_DIR = 'root';
const MAX_NAME_ATTEMPTS = 1000;

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class FileStorage {
  private readonly root: string;

  constructor(mediaRoot: string = Settings.MEDIA_ROOT) {
    this.root = path.resolve(mediaRoot);
  }

  /**
   * Directory (relative to the media root) for files of a folder with the given filesystem path
   */
  static directoryFor(folderPath: string | null): string {
    return path.posix.join(DOCUMENTS_DIR, folderPath || ROOT_DIR);
  }

  /**
   * Write `data` as `filename` inside `directory`. A taken name gets a numeric
   * suffix before the extension (`report_1.pdf`). Returns the stored path,
   * relative to the media root.
   */
  async save(directory: string, filename: string, data: Buffer): Promise<string> {
    const absoluteDir = this.resolve(directory);
    await mkdir(absoluteDir, { recursive: true });

    const ext = path.extname(filename);
    const base = path.basename(filename, ext);
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const candidate = attempt === 0 ? filename : `${base}_${attempt}${ext}`;
      try {
        const handle = await open(path.join(absoluteDir, candidate), 'wx');
        try {
          await handle.writeFile(data);
        } finally {
          await handle.close();
        }
        const stored = path.posix.join(directory, candidate);
        logger.debug(`Stored file ${stored} (${data.length} bytes)`);
        return stored;
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          continue;
        }
        throw error;
      }
    }
    throw new Error(`Could not find a free name for ${filename} in ${directory}`);
  }

  createReadStream(storagePath: string): fs.ReadStream {
    return fs.createReadStream(this.resolve(storagePath));
  }

  async exists(storagePath: string): Promise<boolean> {
    try {
      await stat(this.resolve(storagePath));
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Delete a stored file. A file that is already gone is not an error.
   */
  async remove(storagePath: string): Promise<void> {
    await rm(this.resolve(storagePath), { force: true });
    logger.debug(`Removed stored file ${storagePath}`);
  }

  /**
   * Absolute path for a stored path; refuses anything that escapes the media root
   */
  resolve(storagePath: string): string {
    const resolved = path.resolve(this.root, storagePath);
    if (resolved !== this.root && !resolved.startsWith(this.root + path.sep)) {
      throw new Error(`Path escapes media root: ${storagePath}`);
    }
    return resolved;
  }
}
