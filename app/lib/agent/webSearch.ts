/**
 * webSearch.ts
 *
 * SerpAPI (Google engine) wrapper. Results are only ever embedded in prompts,
 * so the response is flattened to plain text here.
 */

import { SERPAPI_ENDPOINT, getSerpApiKey } from "@/lib/config";
import { describeError, SearchError } from "./errors";

export const NO_SEARCH_RESULT = "No good search result found";

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nonEmptyText(value: unknown): string | null {
  if (typeof value === "string" && value.trim()) return value.trim();
  if (Array.isArray(value)) {
    const parts = value.filter(
      (part): part is string => typeof part === "string" && part.trim() !== "",
    );
    return parts.length > 0 ? parts.join(", ") : null;
  }
  return null;
}

/**
 * Picks the most direct answer out of a SerpAPI response body.
 * Answer box first, then sports, knowledge graph, organic snippets.
 */
export function formatSearchResults(body: unknown): string {
  if (!isRecord(body)) return NO_SEARCH_RESULT;

  const answerBox = body.answer_box;
  if (isRecord(answerBox)) {
    const direct =
      nonEmptyText(answerBox.answer) ??
      nonEmptyText(answerBox.snippet) ??
      nonEmptyText(answerBox.snippet_highlighted_words);
    if (direct) return direct;
  }

  const sports = body.sports_results;
  if (isRecord(sports) && sports.game_spotlight !== undefined) {
    const spotlight = sports.game_spotlight;
    const text = nonEmptyText(spotlight) ?? JSON.stringify(spotlight);
    if (text) return text;
  }

  const knowledgeGraph = body.knowledge_graph;
  if (isRecord(knowledgeGraph)) {
    const description = nonEmptyText(knowledgeGraph.description);
    if (description) return description;
  }

  if (Array.isArray(body.organic_results)) {
    const snippets = body.organic_results
      .map((result) => (isRecord(result) ? nonEmptyText(result.snippet) : null))
      .filter((snippet): snippet is string => snippet !== null);
    if (snippets.length > 0) return snippets.join("\n");
  }

  return NO_SEARCH_RESULT;
}

/**
 * Runs one Google search through SerpAPI and returns the flattened text.
 */
export async function runWebSearch(query: string): Promise<string> {
  const params = new URLSearchParams({
    engine: "google",
    q: query,
    api_key: getSerpApiKey(),
  });

  let res: Response;
  try {
    res = await fetch(`${SERPAPI_ENDPOINT}?${params.toString()}`);
  } catch (error) {
    throw new SearchError(`Web search request failed: ${describeError(error)}`, undefined, {
      cause: error,
    });
  }

  if (!res.ok) {
    throw new SearchError(`Web search failed with HTTP ${res.status}`, res.status);
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (error) {
    throw new SearchError("Web search returned invalid JSON", res.status, {
      cause: error,
    });
  }

  if (isRecord(body) && typeof body.error === "string") {
    throw new SearchError(`Web search error: ${body.error}`, res.status);
  }

  return formatSearchResults(body);
}
