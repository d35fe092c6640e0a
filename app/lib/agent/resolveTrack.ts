/**
 * resolveTrack.ts
 *
 * Catalog-first track resolution:
 * 1. Let the model answer the raw input conversationally
 * 2. Ask it to restate that answer as `Title: ... | Artist: ...`
 * 3. Parse (with per-field fallback) and query the catalog
 *
 * An empty track list is a normal outcome; the workflow reacts to it by
 * trying the web fallback.
 */

import { lookupTracks } from "@/lib/catalog";
import { EXTRACT_TRACK_FROM_ANSWER_TEMPLATE } from "@/lib/prompts";
import { parseTrackExtraction } from "./extract";
import { invokeModel } from "./llm";
import type { TrackResolution } from "./types";

export async function resolveTrack(userInput: string): Promise<TrackResolution> {
  const answer = await invokeModel(userInput);
  const extraction = await invokeModel(EXTRACT_TRACK_FROM_ANSWER_TEMPLATE(answer));

  const { title, artist } = parseTrackExtraction(extraction, { fallback: true });
  const tracks = await lookupTracks(title, artist);

  return { title, artist, tracks };
}
