/**
 * Image Display
 * Presentation sink for resolved posters
 */

import chalk from "chalk";

export interface ImageView {
  path: string;
  title: string;
  width: number;
}

export interface PlaceholderView {
  title: string;
  message: string;
}

export interface ImageDisplay {
  showImage(view: ImageView): void | Promise<void>;
  showPlaceholder(view: PlaceholderView): void | Promise<void>;
}

/**
 * Prints one line per title to the terminal
 */
export class ConsoleImageDisplay implements ImageDisplay {
  showImage({ path, title, width }: ImageView): void {
    console.log(
      `  ${chalk.green("◉")} ${chalk.white(title)} ${chalk.dim("·")} ${chalk.cyan(path)} ${chalk.dim(`(${width}px)`)}`,
    );
  }

  showPlaceholder({ title, message }: PlaceholderView): void {
    console.log(
      `  ${chalk.yellow("◉")} ${chalk.white(title)} ${chalk.dim("·")} ${chalk.dim(message)}`,
    );
  }
}
