/**
 * Image Resolver
 * Looks up the poster URL for a MyAnimeList ID through the Jikan API
 */

import { ZodError } from "zod";
import { Logger } from "./utils/logger";
import { sleep } from "./utils/sleep";
import { JikanAnimeResponseSchema } from "./types";
import type { ApiConfig, JikanAnimeResponse } from "./types";

// One request plus a single retry after HTTP 429
const MAX_REQUESTS = 2;

/**
 * Pick the best poster variant: webp large, then jpg large, then jpg regular
 */
export function selectImageUrl(
  images: JikanAnimeResponse["data"]["images"],
): string | null {
  const candidates = [
    images.webp?.large_image_url,
    images.jpg?.large_image_url,
    images.jpg?.image_url,
  ];
  return candidates.find((url): url is string => !!url) ?? null;
}

export class ImageResolver {
  constructor(
    private config: ApiConfig,
    private logger: Logger = new Logger(),
  ) {}

  /**
   * Resolve the direct image URL for an anime
   * Every failure is logged and collapses to null
   */
  async resolveImageUrl(id: number): Promise<string | null> {
    const url = `${this.config.baseUrl.replace(/\/+$/, "")}/anime/${id}`;

    for (let request = 1; request <= MAX_REQUESTS; request++) {
      await sleep(this.config.requestDelay);

      const controller = new AbortController();
      const timeoutId = setTimeout(
        () => controller.abort(),
        this.config.timeout,
      );

      try {
        const response = await fetch(url, { signal: controller.signal });

        if (response.status === 200) {
          const body = JikanAnimeResponseSchema.parse(await response.json());
          const imageUrl = selectImageUrl(body.data.images);
          if (!imageUrl) {
            this.logger.warn(`No image URL in Jikan response for MAL ID ${id}`);
          }
          return imageUrl;
        }

        await response.body?.cancel();

        if (response.status === 429) {
          if (request < MAX_REQUESTS) {
            this.logger.warn(
              `Rate limited, waiting ${this.config.rateLimitDelay}ms for MAL ID ${id}`,
            );
            await sleep(this.config.rateLimitDelay);
            continue;
          }
          this.logger.warn(`Still rate limited for MAL ID ${id}, giving up`);
          return null;
        }

        this.logger.warn(`Jikan API returned HTTP ${response.status} for MAL ID ${id}`);
        return null;
      } catch (error) {
        this.logger.error(
          `Error getting image from Jikan API for MAL ID ${id}: ${describeError(error)}`,
        );
        return null;
      } finally {
        clearTimeout(timeoutId);
      }
    }

    return null;
  }
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    return `unexpected response shape (${error.issues.map((e) => e.message).join("; ")})`;
  }
  if (error instanceof Error) {
    return error.name === "AbortError" ? "request timed out" : error.message;
  }
  return String(error);
}
