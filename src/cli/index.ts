#!/usr/bin/env tsx

/**
 * CLI entry point for the anime poster cache
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { fetchCommand } from "./commands/fetch";
import { prefetchCommand } from "./commands/prefetch";
import { cacheCommand } from "./commands/cache";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("anime-images")
  .description("Fetch and cache anime poster images from the Jikan API")
  .version("0.1.0");

function withSharedOptions(command: Command): Command {
  return command
    .option("-c, --config <path>", "Path to custom config file")
    .option("-d, --dir <path>", "Image cache directory")
    .option("-v, --verbose", "Verbose output");
}

withSharedOptions(
  program
    .command("fetch <url> <title>")
    .description("Resolve one poster and print its local path"),
).action(fetchCommand);

withSharedOptions(
  program
    .command("prefetch <file>")
    .description("Render every { title, url } entry of a JSON file")
    .option("-w, --width <px>", "Display width")
    .option("--stats <path>", "Write stats JSON to this path"),
).action(prefetchCommand);

withSharedOptions(
  program
    .command("cache")
    .description("List cached posters")
    .option("--prune", "Delete empty cache entries"),
).action(cacheCommand);

program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
