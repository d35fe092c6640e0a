/**
 * workflow.ts
 *
 * Query routing state machine
 *
 * Flow:
 *   DetectType -> (trivia) TriviaSearch -> DBSearch
 *   DetectType -> (track)                  DBSearch
 *   DBSearch   -> (no catalog match) WebSearch -> LyricsSearch
 *   DBSearch   -> (match)                         LyricsSearch
 *   LyricsSearch -> END
 *
 * Nodes run strictly one after another. Each returns only the fields it sets
 * and the runner folds them into the accumulated state. Node errors are not
 * caught here: a failure aborts the run as-is.
 */

import { performance } from "node:perf_hooks";

import { classifyIntent } from "./classifyIntent";
import { normalizeLyrics } from "./normalizeLyrics";
import { resolveTrack } from "./resolveTrack";
import { answerTrivia } from "./trivia";
import type {
  StateUpdate,
  StepReport,
  WorkflowRun,
  WorkflowState,
  WorkflowStep,
} from "./types";
import { resolveViaWeb } from "./webFallback";

type NodeStep = Exclude<WorkflowStep, "END">;
type WorkflowNode = (state: WorkflowState) => Promise<StateUpdate>;

export const INITIAL_STEP: NodeStep = "DetectType";

/**
 * Overlays every defined field of `update` onto `state`. Keys are never
 * removed; `null` is a value and does overwrite.
 */
export function mergeState(
  state: WorkflowState,
  update: StateUpdate,
): WorkflowState {
  const next: WorkflowState = { ...state };
  if (update.queryType !== undefined) next.queryType = update.queryType;
  if (update.extractedTitle !== undefined) next.extractedTitle = update.extractedTitle;
  if (update.extractedArtist !== undefined) next.extractedArtist = update.extractedArtist;
  if (update.dbResult !== undefined) next.dbResult = update.dbResult;
  if (update.trivia !== undefined) next.trivia = update.trivia;
  return next;
}

export function nextStep(step: NodeStep, state: WorkflowState): WorkflowStep {
  switch (step) {
    case "DetectType":
      return state.queryType === "trivia" ? "TriviaSearch" : "DBSearch";
    case "TriviaSearch":
      return "DBSearch";
    case "DBSearch":
      return (state.dbResult ?? []).length === 0 ? "WebSearch" : "LyricsSearch";
    case "WebSearch":
      return "LyricsSearch";
    case "LyricsSearch":
      return "END";
  }
}

export const WORKFLOW_NODES: Record<NodeStep, WorkflowNode> = {
  DetectType: async (state) => ({
    queryType: await classifyIntent(state.userInput),
  }),
  TriviaSearch: async (state) => ({
    trivia: await answerTrivia(state.userInput),
  }),
  DBSearch: async (state) => {
    const { title, artist, tracks } = await resolveTrack(state.userInput);
    return { extractedTitle: title, extractedArtist: artist, dbResult: tracks };
  },
  WebSearch: async (state) => {
    const { title, artist, tracks } = await resolveViaWeb(
      state.extractedTitle,
      state.extractedArtist,
      state.userInput,
    );
    return { extractedTitle: title, extractedArtist: artist, dbResult: tracks };
  },
  LyricsSearch: async (state) => ({
    dbResult: normalizeLyrics(state.dbResult ?? []),
  }),
};

export interface RunWorkflowOptions {
  onStep?: (report: StepReport) => void;
}

export async function runWorkflow(
  userInput: string,
  options: RunWorkflowOptions = {},
): Promise<WorkflowRun> {
  let state: WorkflowState = { userInput };
  const steps: NodeStep[] = [];
  let step: WorkflowStep = INITIAL_STEP;

  while (step !== "END") {
    const start = performance.now();
    const update = await WORKFLOW_NODES[step](state);
    state = mergeState(state, update);
    steps.push(step);

    options.onStep?.({
      step,
      durationMs: Number((performance.now() - start).toFixed(2)),
      state,
    });

    step = nextStep(step, state);
  }

  return { state, steps };
}
