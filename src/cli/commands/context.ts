/**
 * Shared command setup - validates global options and loads config
 */

import { z } from "zod";
import { loadConfig, Logger } from "../../utils";
import type { AppConfig } from "../../types";

export const SharedOptionsSchema = z.object({
  config: z.string().optional(),
  dir: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type SharedOptions = z.infer<typeof SharedOptionsSchema>;

export interface CommandContext {
  config: AppConfig;
  logger: Logger;
  verbose: boolean;
}

/**
 * Load configuration (default → user → custom) and apply CLI overrides
 */
export async function createContext(
  opts: SharedOptions,
): Promise<CommandContext> {
  const options = SharedOptionsSchema.parse(opts);
  const { config, errors } = await loadConfig(options.config);

  if (options.dir) {
    config.images.directory = options.dir;
  }
  if (options.verbose) {
    config.logging.level = "debug";
  }

  const logger = new Logger(config.logging.level);
  for (const { path, error } of errors) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn(`Ignoring config ${path}: ${message}`);
  }

  return { config, logger, verbose: options.verbose ?? false };
}
