import type { Track } from "@/lib/agent/types";
import { LYRICS_PREVIEW_CHARS } from "@/lib/config";

export type ChatState = {
  trivia?: string | null;
  dbResult?: Track[] | null;
};

export type ChatVM = {
  trivia: string | null;
  tracks: Array<{ index: number; label: string; track: Track }>;
  emptyMessage: string | null;
};

export const NO_TRACKS_MESSAGE = "No tracks found for this input.";
export const NO_LYRICS_MESSAGE = "No lyrics available for this track.";

export function trackLabel(track: Track, index: number): string {
  return `${index + 1}. ${track.title} by ${track.artist}`;
}

export function lyricsPreview(
  lyrics: string | null | undefined,
  maxChars = LYRICS_PREVIEW_CHARS,
): string | null {
  if (!lyrics) return null;
  return lyrics.slice(0, maxChars);
}

export function audioSrc(track: Track): string {
  return `/api/audio?${new URLSearchParams({ path: track.filePath }).toString()}`;
}

export default function buildChatViewModel(state: ChatState): ChatVM {
  const tracks = (state.dbResult ?? []).map((track, index) => ({
    index,
    label: trackLabel(track, index),
    track,
  }));

  return {
    trivia: state.trivia?.trim() ? state.trivia : null,
    tracks,
    // An empty result is informational, not an error.
    emptyMessage: tracks.length === 0 ? NO_TRACKS_MESSAGE : null,
  };
}
