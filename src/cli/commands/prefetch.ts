/**
 * Prefetch command - Renders every entry of a dataset file in order
 */

import { readFile } from "fs/promises";
import ora from "ora";
import { z } from "zod";
import { AnimeImageHandler } from "../../image-handler";
import { Tracker } from "../../utils";
import { stats } from "../../modules";
import { AnimeEntryListSchema } from "../../types";
import type { ImageDisplay } from "../../image-display";
import { createContext, SharedOptionsSchema } from "./context";

const PrefetchOptionsSchema = SharedOptionsSchema.extend({
  width: z.coerce.number().int().positive().optional(),
  stats: z.string().optional(),
});

type Options = z.input<typeof PrefetchOptionsSchema>;

export async function prefetchCommand(
  file: string,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Loading entries...", indent: 2 }).start();

  try {
    const options = PrefetchOptionsSchema.parse(opts);
    const { config, logger, verbose } = await createContext(options);

    const content = await readFile(file, "utf-8");
    const entries = AnimeEntryListSchema.parse(JSON.parse(content));

    const tracker = new Tracker();

    // Keep the spinner intact by printing through it
    const display: ImageDisplay = {
      showImage: ({ path, title, width }) => {
        spinner.succeed(`${title} → ${path} (${width}px)`);
        spinner.start();
      },
      showPlaceholder: ({ title, message }) => {
        spinner.warn(`${title} → ${message}`);
        spinner.start();
      },
    };

    const handler = new AnimeImageHandler(config, {
      logger,
      tracker,
      display,
    });

    for (const [index, entry] of entries.entries()) {
      spinner.text = `Fetching ${index + 1}/${entries.length}: ${entry.title}`;
      await handler.renderImage(entry.url, entry.title, options.width);
    }

    spinner.clear();
    spinner.stop();

    await stats(tracker, { exportPath: options.stats, verbose });
  } catch (error) {
    spinner.fail("Prefetch failed");
    console.error(error);
    process.exit(1);
  }
}
