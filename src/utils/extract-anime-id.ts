// ASCII digits only; MyAnimeList IDs never use other numerals
const ANIME_ID_REGEX = /\/anime\/(\d+)/;

/**
 * Extract the MyAnimeList ID from an anime URL
 * Returns null when the URL carries no `/anime/<digits>` segment
 *
 * @example
 * extractAnimeId("https://myanimelist.net/anime/16498/Shingeki_no_Kyojin") // 16498
 * extractAnimeId("https://myanimelist.net/manga/2/Berserk") // null
 */
export function extractAnimeId(url: unknown): number | null {
  if (typeof url !== "string") return null;

  const match = url.match(ANIME_ID_REGEX);
  if (!match) return null;

  const id = Number(match[1]);
  return Number.isSafeInteger(id) ? id : null;
}
