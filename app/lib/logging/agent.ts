import { join } from "path";

import { describeError, isAgentError } from "@/lib/agent/errors";
import type { StepReport, WorkflowState } from "@/lib/agent/types";
import { LOGS_DIR, writeJsonlCapped } from "./jsonl";

export const AGENT_LOG_FILE = join(LOGS_DIR, "agent.jsonl");

export function logStep(report: StepReport): void {
  const { step, durationMs, state } = report;
  console.log("[agent][step]", {
    step,
    durationMs,
    queryType: state.queryType ?? null,
    extractedTitle: state.extractedTitle ?? null,
    extractedArtist: state.extractedArtist ?? null,
    tracks: state.dbResult?.length ?? null,
  });
}

function summarizeState(state: WorkflowState | null): unknown {
  if (!state) return null;
  return {
    queryType: state.queryType ?? null,
    extractedTitle: state.extractedTitle ?? null,
    extractedArtist: state.extractedArtist ?? null,
    hasTrivia: Boolean(state.trivia),
    tracks: (state.dbResult ?? []).slice(0, 5).map((track) => ({
      title: track.title,
      artist: track.artist,
    })),
    trackCount: state.dbResult?.length ?? 0,
  };
}

/**
 * Records one finished (or failed) run in a capped JSONL file.
 * Logging problems are reported and swallowed so they never fail a run.
 */
export async function logAgentRun(params: {
  query: string;
  state: WorkflowState | null;
  steps: string[];
  error?: unknown;
  filePath?: string;
  maxEntries?: number;
}): Promise<void> {
  try {
    const { query, state, steps, error } = params;
    const entry = {
      timestamp: new Date().toISOString(),
      query,
      steps,
      state: summarizeState(state),
      error:
        error === undefined
          ? null
          : {
              code: isAgentError(error) ? error.code : "unknown",
              message: describeError(error),
            },
    };

    await writeJsonlCapped({
      filePath: params.filePath ?? AGENT_LOG_FILE,
      entry,
      maxEntries: params.maxEntries ?? 3,
    });
  } catch (logError) {
    console.error("Failed to log agent run:", logError);
  }
}
