/**
 * Directory Walker
 *
 * Recursive, top-down traversal. Each directory is yielded once with its
 * files (sorted by name) before any of its subdirectories, so a consumer can
 * reset per-directory state on every batch.
 *
 * Symlinks count as files unless they point at a directory. Symlinked
 * directories are not descended into.
 *
 * File lists are read before the batch is yielded; renames made while
 * handling a batch do not affect the walk.
 */

import type { Dirent } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

export interface DirectoryBatch {
  directory: string;
  /** Absolute paths of files and file symlinks directly inside the directory */
  files: string[];
}

async function isFileEntry(directory: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;

  const linkPath = path.join(directory, entry.name);
  try {
    return !(await fs.stat(linkPath)).isDirectory();
  } catch (error) {
    // Dangling link: renaming moves the link itself
    logger.debug('Symlink target unreadable', { linkPath, error: getErrorMessage(error) });
    return true;
  }
}

export async function* walkDirectories(rootPath: string): AsyncGenerator<DirectoryBatch> {
  const pending: string[] = [path.resolve(rootPath)];

  while (pending.length > 0) {
    const directory = pending.shift();
    if (directory === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      // Unreadable subdirectory: report and keep walking the rest
      logger.warn('Skipping unreadable directory', { directory, error: getErrorMessage(error) });
      continue;
    }

    const sorted = [...entries].sort((a, b) => a.name.localeCompare(b.name));
    const files: string[] = [];
    for (const entry of sorted) {
      if (await isFileEntry(directory, entry)) {
        files.push(path.join(directory, entry.name));
      }
    }
    const subdirectories = sorted
      .filter(entry => entry.isDirectory())
      .map(entry => path.join(directory, entry.name));

    logger.debug('Entering directory', {
      directory,
      files: files.length,
      subdirectories: subdirectories.length,
    });

    yield { directory, files };

    // Depth-first, parent before children, siblings in name order
    pending.unshift(...subdirectories);
  }
}
