/**
 * Download a binary image to disk with retry logic
 */

import { open } from "fs/promises";
import { getFileSize, removeFile } from "./fs";
import { sleep } from "./sleep";
import type { Logger } from "./logger";

export interface DownloadOptions {
  attempts: number;
  retryDelay: number;
  // Longest wait for the response or for the next body chunk, in milliseconds
  timeout: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

/**
 * Fetch `url` into `outputPath`
 *
 * Each attempt needs HTTP 200, an image content type and a non-empty
 * file once the body is written. Anything short of that removes the file
 * and moves on to the next attempt.
 *
 * @returns true once a non-empty file is in place, false after the last attempt
 */
export async function downloadImage(
  url: string,
  outputPath: string,
  options: DownloadOptions,
): Promise<boolean> {
  const { attempts, retryDelay, timeout, headers, logger } = options;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (attempt > 1) {
      await sleep(retryDelay);
    }

    const controller = new AbortController();
    let timeoutId = setTimeout(() => controller.abort(), timeout);
    const restartTimeout = (): void => {
      clearTimeout(timeoutId);
      timeoutId = setTimeout(() => controller.abort(), timeout);
    };

    try {
      const response = await fetch(url, { headers, signal: controller.signal });

      if (response.status !== 200) {
        logger?.warn(
          `Attempt ${attempt}/${attempts} for ${url}: HTTP ${response.status}`,
        );
        await response.body?.cancel();
        continue;
      }

      const contentType = response.headers.get("content-type") ?? "";
      if (!contentType.toLowerCase().includes("image")) {
        logger?.warn(
          `Attempt ${attempt}/${attempts} for ${url}: unexpected content type "${contentType}"`,
        );
        await response.body?.cancel();
        continue;
      }

      await writeBody(response.body, outputPath, restartTimeout);

      const size = await getFileSize(outputPath);
      if (size !== null && size > 0) {
        logger?.debug(`Saved ${url} to ${outputPath} (${size} bytes)`);
        return true;
      }

      logger?.warn(`Attempt ${attempt}/${attempts} for ${url}: empty file`);
      await removeFile(outputPath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.warn(`Attempt ${attempt}/${attempts} failed for ${url}: ${message}`);
      await discardPartial(outputPath, logger);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  return false;
}

/**
 * Stream a response body into a file chunk by chunk
 */
async function writeBody(
  body: Response["body"],
  outputPath: string,
  onChunk: () => void,
): Promise<void> {
  const handle = await open(outputPath, "w");
  try {
    if (!body) return;

    const reader = body.getReader();
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      onChunk();
      await handle.write(value);
    }
  } finally {
    await handle.close();
  }
}

async function discardPartial(outputPath: string, logger?: Logger): Promise<void> {
  try {
    await removeFile(outputPath);
  } catch (error) {
    logger?.error(`Failed to remove partial download ${outputPath}`, error);
  }
}
