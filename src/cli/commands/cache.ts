/**
 * Cache command - Lists cached posters and prunes empty entries
 */

import chalk from "chalk";
import { listCache, pruneCache } from "../../modules";
import { createContext } from "./context";
import type { SharedOptions } from "./context";

interface CacheOptions extends SharedOptions {
  prune?: boolean;
}

export async function cacheCommand(opts: CacheOptions): Promise<void> {
  try {
    const { config } = await createContext(opts);
    const directory = config.images.directory;

    if (opts.prune) {
      const removed = await pruneCache(directory);
      for (const entry of removed) {
        console.log(`  ${chalk.red("✖")} ${entry.filename}`);
      }
      console.log(
        `\n  Removed ${removed.length} empty ${removed.length === 1 ? "entry" : "entries"} from ${directory}`,
      );
      return;
    }

    const entries = await listCache(directory);
    if (entries.length === 0) {
      console.log(`  ${chalk.dim(`No cached images in ${directory}`)}`);
      return;
    }

    let totalBytes = 0;
    for (const entry of entries) {
      totalBytes += entry.size;
      const size =
        entry.size === 0 ? chalk.red("empty") : chalk.dim(formatBytes(entry.size));
      console.log(`  ${chalk.cyan("◉")} ${entry.filename.padEnd(52)} ${size}`);
    }
    console.log(
      `\n  ${entries.length} images · ${formatBytes(totalBytes)} in ${directory}`,
    );
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
