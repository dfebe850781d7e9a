import { join } from "node:path";

export const DEFAULT_IMAGES_DIRECTORY = "anime_images";

const MAX_TITLE_LENGTH = 40;
const ALLOWED_CHARACTER = /[\p{L}\p{N} _-]/u;

/**
 * Reduce a title to letters, digits, spaces, hyphens and underscores,
 * then swap spaces for underscores and cap the length
 *
 * @example
 * sanitizeTitle("Attack on Titan!") // "Attack_on_Titan"
 */
export function sanitizeTitle(title: string): string {
  const kept = Array.from(title)
    .filter((char) => ALLOWED_CHARACTER.test(char))
    .join("")
    .trim()
    .replace(/ /g, "_");

  return Array.from(kept).slice(0, MAX_TITLE_LENGTH).join("");
}

/**
 * Cache path for an anime poster
 *
 * @example
 * deriveFilename("Attack on Titan!", 16498) // "anime_images/Attack_on_Titan_16498.jpg"
 */
export function deriveFilename(
  title: string,
  id: number,
  directory: string = DEFAULT_IMAGES_DIRECTORY,
): string {
  return join(directory, `${sanitizeTitle(title)}_${id}.jpg`);
}
