import { access, copyFile, constants, mkdir, rename, unlink } from 'fs/promises';
import { dirname } from 'path';
import type { ImportMode } from '../../config/index.js';
import { FilesystemOperationError, errorMessage } from '../../errors.js';

export const DESTINATION_EXISTS = 'destination already exists';

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Copy or move `source` to `destination`. Existing files at the destination
 * are never overwritten. On failure the source is left where it was.
 */
export async function transferFile(source: string, destination: string, mode: ImportMode): Promise<void> {
  try {
    if (await exists(destination)) {
      throw new Error(DESTINATION_EXISTS);
    }
    await mkdir(dirname(destination), { recursive: true });

    if (mode === 'copy') {
      await copyFile(source, destination, constants.COPYFILE_EXCL);
      return;
    }

    try {
      await rename(source, destination);
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') {
        throw error;
      }
      // Different filesystems: copy then remove the original
      await copyFile(source, destination, constants.COPYFILE_EXCL);
      await unlink(source);
    }
  } catch (error) {
    throw new FilesystemOperationError(source, destination, errorMessage(error), error);
  }
}
