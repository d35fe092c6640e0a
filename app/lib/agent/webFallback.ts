/**
 * webFallback.ts
 *
 * Used ONLY when the catalog-first pass found nothing.
 *
 * Each query gets one web search and one extraction prompt; the first query
 * whose parsed title/artist hits the catalog wins. The title-based query is
 * always tried before the artist-only one.
 */

import { lookupTracks } from "@/lib/catalog";
import { EXTRACT_TRACK_FROM_RESULTS_TEMPLATE } from "@/lib/prompts";
import { hasCombinedMatch, parseTrackExtraction } from "./extract";
import { invokeModel } from "./llm";
import type { Track, TrackResolution } from "./types";
import { runWebSearch } from "./webSearch";

export function buildFallbackQueries(
  title: string | null | undefined,
  artist: string | null | undefined,
  userInput: string,
): string[] {
  const queries: string[] = [];
  if (title) {
    queries.push(`${title} song by ${artist ? artist : ""}`);
  }
  if (artist) {
    queries.push(`songs by ${artist}`);
  }
  if (!title && !artist) {
    queries.push(userInput);
  }
  return queries;
}

export async function resolveViaWeb(
  title: string | null | undefined,
  artist: string | null | undefined,
  userInput: string,
): Promise<TrackResolution> {
  let foundTitle: string | null = null;
  let foundArtist: string | null = null;
  let tracks: Track[] = [];

  for (const query of buildFallbackQueries(title, artist, userInput)) {
    const results = await runWebSearch(query);
    const reply = await invokeModel(EXTRACT_TRACK_FROM_RESULTS_TEMPLATE(results));

    // No per-field fallback here: only a full `Title | Artist` reply counts.
    if (!hasCombinedMatch(reply)) continue;

    const parsed = parseTrackExtraction(reply, { fallback: false });
    foundTitle = parsed.title;
    foundArtist = parsed.artist;
    tracks = await lookupTracks(foundTitle, foundArtist);
    if (tracks.length > 0) break;
  }

  return { title: foundTitle, artist: foundArtist, tracks };
}
