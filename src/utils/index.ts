/**
 * Utility exports
 */

// Identifier and path utilities
export { extractAnimeId } from "./extract-anime-id";
export {
  deriveFilename,
  sanitizeTitle,
  DEFAULT_IMAGES_DIRECTORY,
} from "./derive-filename";

// Filesystem utilities
export { fileExists, getFileSize, removeFile } from "./fs";

// Network utilities
export { downloadImage } from "./download-image";
export type { DownloadOptions } from "./download-image";
export { sleep } from "./sleep";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
} from "./load-config";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
export type { ImageIssue, ImageStats } from "./tracker";
