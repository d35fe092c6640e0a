import { CLI_LYRICS_PREVIEW_CHARS } from "@/lib/config";
import type { WorkflowState } from "./types";

/**
 * Plain-text rendering of a final state for the terminal.
 */
export function formatAnswer(state: WorkflowState): string {
  const lines: string[] = [];
  const tracks = state.dbResult ?? [];

  if (state.trivia) {
    lines.push("", "Trivia:", state.trivia);
  }

  if (tracks.length > 0) {
    lines.push("", "Found Tracks:");
    for (const track of tracks) {
      lines.push(`- ${track.title} by ${track.artist}`);
      lines.push(`  Lyrics:\n${(track.lyrics ?? "").slice(0, CLI_LYRICS_PREVIEW_CHARS)}...`, "");
    }
  } else {
    lines.push("", "No tracks found.");
  }

  return lines.join("\n");
}
