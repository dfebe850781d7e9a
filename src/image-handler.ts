/**
 * Anime Image Handler
 * Serves poster images from the local cache, downloading them on a miss
 */

import { mkdir } from "fs/promises";
import { ImageResolver } from "./image-resolver";
import { ConsoleImageDisplay } from "./image-display";
import type { ImageDisplay } from "./image-display";
import {
  Logger,
  deriveFilename,
  downloadImage,
  extractAnimeId,
  fileExists,
  getFileSize,
  removeFile,
} from "./utils";
import type { Tracker } from "./utils";
import type {
  AppConfig,
  FailedImageResult,
  ImageFailureReason,
  ImageResult,
} from "./types";

export type HandlerConfig = Pick<AppConfig, "images" | "api" | "display">;

export interface HandlerOptions {
  logger?: Logger;
  display?: ImageDisplay;
  tracker?: Tracker;
  resolver?: ImageResolver;
}

export class AnimeImageHandler {
  private logger: Logger;
  private display: ImageDisplay;
  private tracker?: Tracker;
  private resolver: ImageResolver;

  constructor(
    private config: HandlerConfig,
    options: HandlerOptions = {},
  ) {
    this.logger = options.logger ?? new Logger();
    this.display = options.display ?? new ConsoleImageDisplay();
    this.tracker = options.tracker;
    this.resolver =
      options.resolver ?? new ImageResolver(config.api, this.logger);
  }

  get directory(): string {
    return this.config.images.directory;
  }

  /**
   * Cache path for a title and MAL ID under this handler's directory
   */
  pathFor(title: string, id: number): string {
    return deriveFilename(title, id, this.directory);
  }

  /**
   * Resolve a poster to a local file and report how it got there
   * Never throws: every failure becomes a "failed" result
   */
  async acquire(sourceUrl: string, title: string): Promise<ImageResult> {
    const result = await this.resolveLocal(sourceUrl, title);
    this.tracker?.track(title, sourceUrl, result);
    return result;
  }

  /**
   * Get local path to anime image, downloading if necessary
   */
  async getLocalImage(sourceUrl: string, title: string): Promise<string | null> {
    const result = await this.acquire(sourceUrl, title);
    return result.status === "failed" ? null : result.path;
  }

  /**
   * Show the poster, or the placeholder when it is unavailable
   *
   * @returns true when the image itself was shown
   */
  async renderImage(
    sourceUrl: string,
    title: string,
    width: number = this.config.display.width,
  ): Promise<boolean> {
    const path = await this.getLocalImage(sourceUrl, title);

    if (path && (await fileExists(path))) {
      try {
        await this.display.showImage({ path, title, width });
        return true;
      } catch (error) {
        this.logger.error(`Error displaying image ${path}`, error);
        // Drop the entry so the next request downloads it again
        await this.discard(path);
      }
    }

    try {
      await this.display.showPlaceholder({
        title,
        message: this.config.display.placeholder,
      });
    } catch (error) {
      this.logger.error(`Error displaying placeholder for ${title}`, error);
    }
    return false;
  }

  private async resolveLocal(
    sourceUrl: string,
    title: string,
  ): Promise<ImageResult> {
    const id = extractAnimeId(sourceUrl);
    if (id === null) {
      this.logger.warn(`Could not extract MAL ID from ${sourceUrl}`);
      return failed(null, "identifier-not-found", `No /anime/<id> in ${sourceUrl}`);
    }

    const path = this.pathFor(title, id);

    try {
      const size = await getFileSize(path);
      if (size !== null && size > 0) {
        this.logger.debug(`Cache hit for MAL ID ${id}: ${path}`);
        return { status: "cached", id, path };
      }

      const healed = size === 0;
      if (healed) {
        this.logger.warn(`Removing empty cache entry ${path}`);
        await removeFile(path);
      }

      const imageUrl = await this.resolver.resolveImageUrl(id);
      if (!imageUrl) {
        return failed(id, "resolution-failed", `No image URL for MAL ID ${id}`);
      }

      await mkdir(this.directory, { recursive: true });

      const { attempts, retryDelay, timeout, headers } = this.config.images;
      const saved = await downloadImage(imageUrl, path, {
        attempts,
        retryDelay,
        timeout,
        headers,
        logger: this.logger,
      });

      if (!saved) {
        return failed(
          id,
          "download-failed",
          `Gave up on ${imageUrl} after ${attempts} attempts`,
        );
      }

      this.logger.debug(`Downloaded MAL ID ${id} to ${path}`);
      return { status: "downloaded", id, path, healed };
    } catch (error) {
      this.logger.error(`Failed to cache image for MAL ID ${id}`, error);
      const details = error instanceof Error ? error.message : String(error);
      return failed(id, "download-failed", details);
    }
  }

  private async discard(path: string): Promise<void> {
    try {
      await removeFile(path);
    } catch (error) {
      this.logger.error(`Failed to remove ${path}`, error);
    }
  }
}

function failed(
  id: number | null,
  reason: ImageFailureReason,
  details: string,
): FailedImageResult {
  return { status: "failed", id, reason, details };
}
