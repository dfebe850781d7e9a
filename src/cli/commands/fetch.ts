/**
 * Fetch command - Resolves a single poster and prints its local path
 */

import chalk from "chalk";
import { AnimeImageHandler } from "../../image-handler";
import { createContext } from "./context";
import type { SharedOptions } from "./context";

export async function fetchCommand(
  url: string,
  title: string,
  opts: SharedOptions,
): Promise<void> {
  try {
    const { config, logger } = await createContext(opts);
    const handler = new AnimeImageHandler(config, { logger });
    const result = await handler.acquire(url, title);

    if (result.status === "failed") {
      console.log(
        `${chalk.yellow("◆")} ${config.display.placeholder} ${chalk.dim(`(${result.reason})`)}`,
      );
      process.exitCode = 1;
      return;
    }

    console.log(result.path);
  } catch (error) {
    console.error(error);
    process.exit(1);
  }
}
