/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  ApiConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Images
export type {
  JikanAnimeResponse,
  ImageFailureReason,
  ImageResult,
  FailedImageResult,
} from "./images";
export { AnimeEntryListSchema, JikanAnimeResponseSchema } from "./images";
