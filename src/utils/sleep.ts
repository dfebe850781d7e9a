/**
 * Blocking wait used for rate limiting and retry pauses
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((r) => setTimeout(r, ms));
}
