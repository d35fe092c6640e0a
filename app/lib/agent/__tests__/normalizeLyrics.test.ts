import { describe, expect, it } from "vitest";

import { LYRICS_PLACEHOLDER, normalizeLyrics } from "../normalizeLyrics";
import type { Track } from "../types";

const tracks: Track[] = [
  { title: "Heroes", artist: "David Bowie", filePath: "a.mp3", lyrics: null },
  { title: "Yesterday", artist: "The Beatles", filePath: "b.mp3", lyrics: "All my troubles" },
  { title: "Heroes", artist: "David Bowie", filePath: "c.mp3", lyrics: "" },
];

describe("normalizeLyrics", () => {
  it("fills missing lyrics with the placeholder and keeps order", () => {
    expect(normalizeLyrics(tracks).map((t) => [t.filePath, t.lyrics])).toEqual([
      ["a.mp3", "Lyrics not available in database."],
      ["b.mp3", "All my troubles"],
      ["c.mp3", LYRICS_PLACEHOLDER],
    ]);
  });

  it("does not mutate its input", () => {
    normalizeLyrics(tracks);
    expect(tracks[0]?.lyrics).toBeNull();
  });

  it("is idempotent", () => {
    const once = normalizeLyrics(tracks);
    expect(normalizeLyrics(once)).toEqual(once);
  });

  it("maps an empty list to an empty list", () => {
    expect(normalizeLyrics([])).toEqual([]);
  });
});
