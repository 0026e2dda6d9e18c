/**
 * File Renamer
 *
 * Filesystem collaborator for the rename orchestrator. Renames within the
 * same directory and never overwrites a different existing file.
 */

import fs from 'fs-extra';
import {
  FileNotFoundError,
  FileSystemError,
  PermissionError,
  RenameConflictError,
  RenameError,
} from '../../errors/index.js';
import { getErrorCode, toError } from '../../utils/errorHandling.js';

export interface FileRenamer {
  rename(sourcePath: string, targetPath: string): Promise<void>;
}

/**
 * A case-only rename on a case-insensitive filesystem: the target "exists"
 * because it is the source itself. Hard links also share an inode but have
 * distinct names, and rename(2) between them is a silent no-op.
 */
async function isCaseOnlyRename(sourcePath: string, targetPath: string): Promise<boolean> {
  if (sourcePath.toLowerCase() !== targetPath.toLowerCase()) {
    return false;
  }
  const [source, target] = await Promise.all([fs.stat(sourcePath), fs.stat(targetPath)]);
  return source.dev === target.dev && source.ino === target.ino;
}

export class FsFileRenamer implements FileRenamer {
  async rename(sourcePath: string, targetPath: string): Promise<void> {
    try {
      if (await fs.pathExists(targetPath)) {
        if (!(await isCaseOnlyRename(sourcePath, targetPath))) {
          throw new RenameConflictError(sourcePath, targetPath, { service: 'FsFileRenamer' });
        }
      }

      await fs.rename(sourcePath, targetPath);
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw error;
      }
      throw this.wrapError(error, sourcePath, targetPath);
    }
  }

  private wrapError(error: unknown, sourcePath: string, targetPath: string): FileSystemError {
    const cause = toError(error);
    const context = { service: 'FsFileRenamer', metadata: { targetPath } };

    switch (getErrorCode(error)) {
      case 'ENOENT':
        return new FileNotFoundError(sourcePath, undefined, context);
      case 'EACCES':
      case 'EPERM':
        return new PermissionError(sourcePath, 'rename', undefined, context, cause);
      default:
        return new RenameError(sourcePath, targetPath, cause.message, context, cause);
    }
  }
}
