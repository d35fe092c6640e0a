import type { Track } from "./types";

export const LYRICS_PLACEHOLDER = "Lyrics not available in database.";

export function normalizeLyrics(tracks: readonly Track[]): Track[] {
  return tracks.map((track) =>
    track.lyrics ? track : { ...track, lyrics: LYRICS_PLACEHOLDER },
  );
}
