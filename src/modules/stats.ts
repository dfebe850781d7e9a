/**
 * Stats Module
 * Displays image statistics and issues
 */

import chalk from "chalk";
import type { ImageStats, Tracker } from "../utils";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a progress bar with percentage
 */
function progressBar(
  current: number,
  total: number,
  width: number = 24,
): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON (when a path is given) and print them
 */
export async function stats(
  tracker: Tracker,
  options: { exportPath?: string; verbose?: boolean } = {},
): Promise<void> {
  if (options.exportPath) {
    await tracker.exportStats(options.exportPath);
  }

  const summary = tracker.getStats();
  const statusIcon =
    summary.failedImages > 0 ? chalk.yellow("◆") : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Prefetch Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );

  displayImagesSection(summary);
  displayIssuesSection(summary, options.verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayImagesSection(summary: ImageStats): void {
  console.log(sectionHeader("Images"));

  const successful = summary.downloadedImages + summary.cachedImages;
  console.log(`   ${progressBar(successful, summary.totalImages)}`);

  console.log(
    statRow(chalk.green("◉"), "Downloaded", summary.downloadedImages, chalk.green),
  );
  console.log(
    statRow(chalk.cyan("◉"), "Cached", summary.cachedImages, chalk.cyan),
  );

  if (summary.healedImages > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Healed", summary.healedImages, chalk.yellow),
    );
  }

  if (summary.failedImages > 0) {
    console.log(
      statRow(chalk.red("◉"), "Failed", summary.failedImages, chalk.red),
    );
  }
}

function displayIssuesSection(summary: ImageStats, verbose?: boolean): void {
  if (summary.issues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  const counts = new Map<string, number>();
  for (const issue of summary.issues) {
    counts.set(issue.reason, (counts.get(issue.reason) ?? 0) + 1);
  }
  for (const [reason, count] of counts) {
    console.log(statRow(chalk.red("✖"), reason, count, chalk.red));
  }

  if (!verbose) {
    return;
  }

  for (const issue of summary.issues.slice(0, 10)) {
    console.log(`      ${chalk.dim("·")} ${issue.title} ${chalk.dim(issue.sourceUrl)}`);
    console.log(`        ${chalk.dim(issue.details)}`);
  }
  if (summary.issues.length > 10) {
    console.log(`      ${chalk.dim(`  +${summary.issues.length - 10} more`)}`);
  }
}
