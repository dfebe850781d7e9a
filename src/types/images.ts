/**
 * Image acquisition types
 */

import { z } from "zod";

// ============================================================================
// Jikan API
// ============================================================================

const ImageVariantSchema = z.object({
  image_url: z.string().nullish(),
  small_image_url: z.string().nullish(),
  large_image_url: z.string().nullish(),
});

/**
 * Subset of GET /anime/{id} that carries the poster URLs
 */
export const JikanAnimeResponseSchema = z.object({
  data: z.object({
    mal_id: z.number().int().optional(),
    images: z.object({
      jpg: ImageVariantSchema.optional(),
      webp: ImageVariantSchema.optional(),
    }),
  }),
});

export type JikanAnimeResponse = z.infer<typeof JikanAnimeResponseSchema>;

// ============================================================================
// Dataset entries
// ============================================================================

const AnimeEntrySchema = z
  .object({
    title: z.string(),
    url: z.string(),
  })
  .passthrough();

export const AnimeEntryListSchema = z.array(AnimeEntrySchema);

// ============================================================================
// Acquisition results
// ============================================================================

export type ImageFailureReason =
  | "identifier-not-found"
  | "resolution-failed"
  | "download-failed";

interface CachedImageResult {
  status: "cached";
  id: number;
  path: string;
}

interface DownloadedImageResult {
  status: "downloaded";
  id: number;
  path: string;
  // A zero-byte entry was removed before the download
  healed: boolean;
}

export interface FailedImageResult {
  status: "failed";
  id: number | null;
  reason: ImageFailureReason;
  details: string;
}

export type ImageResult =
  | CachedImageResult
  | DownloadedImageResult
  | FailedImageResult;
