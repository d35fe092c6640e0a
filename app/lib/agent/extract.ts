import type { TrackExtraction } from "./types";

const COMBINED_PATTERN = /Title:\s*(.*?)\s*\|\s*Artist:\s*(.*)/;
const TITLE_PATTERN = /Title:\s*(.*)/;
const ARTIST_PATTERN = /Artist:\s*(.*)/;

function capture(pattern: RegExp, text: string, group = 1): string | null {
  const match = pattern.exec(text);
  const value = match?.[group]?.trim();
  return value ? value : null;
}

/**
 * Reads a `Title: <t> | Artist: <a>` reply. Anything that does not follow the
 * shape degrades to null fields rather than an error.
 *
 * With `fallback`, a missing title or artist is retried on its own label.
 */
export function parseTrackExtraction(
  text: string,
  options: { fallback: boolean },
): TrackExtraction {
  let title = capture(COMBINED_PATTERN, text, 1);
  let artist = capture(COMBINED_PATTERN, text, 2);

  if (options.fallback) {
    if (!title) title = capture(TITLE_PATTERN, text);
    if (!artist) artist = capture(ARTIST_PATTERN, text);
  }

  return { title, artist };
}

/**
 * True when the reply matched the combined pattern at all.
 */
export function hasCombinedMatch(text: string): boolean {
  return COMBINED_PATTERN.test(text);
}
