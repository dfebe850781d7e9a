/**
 * Cache Module
 * The cache directory listing is the cache index
 */

import fg from "fast-glob";
import { stat } from "fs/promises";
import { join } from "node:path";
import { removeFile } from "../utils";

export interface CacheEntry {
  path: string;
  filename: string;
  id: number | null;
  size: number;
}

const ENTRY_ID_REGEX = /_(\d+)\.jpg$/;

/**
 * List cached posters, sorted by filename
 * A missing directory is an empty cache
 */
export async function listCache(directory: string): Promise<CacheEntry[]> {
  const filenames = await fg("*.jpg", {
    cwd: directory,
    onlyFiles: true,
  });

  const entries: CacheEntry[] = [];
  for (const filename of filenames.sort()) {
    const path = join(directory, filename);
    const info = await stat(path);
    const match = filename.match(ENTRY_ID_REGEX);
    entries.push({
      path,
      filename,
      id: match ? Number(match[1]) : null,
      size: info.size,
    });
  }

  return entries;
}

/**
 * Delete zero-byte entries
 *
 * @returns the removed entries
 */
export async function pruneCache(directory: string): Promise<CacheEntry[]> {
  const empty = (await listCache(directory)).filter((e) => e.size === 0);
  for (const entry of empty) {
    await removeFile(entry.path);
  }
  return empty;
}
