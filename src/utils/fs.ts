/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, stat, unlink } from "fs/promises";
import { constants } from "node:fs";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size of a regular file in bytes, or null when there is none at `path`
 */
export async function getFileSize(path: string): Promise<number | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? info.size : null;
  } catch (error) {
    if (isNotFound(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Delete a file, ignoring a missing one
 */
export async function removeFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
