/**
 * Module exports
 */

export { stats, formatDuration } from "./stats";
export { listCache, pruneCache } from "./cache";
export type { CacheEntry } from "./cache";
