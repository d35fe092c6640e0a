import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { RunWorkflowOptions } from "../workflow";
import type { WorkflowRun, WorkflowState } from "../types";
import { SearchError } from "../errors";

const { mockRunWorkflow, mockLogAgentRun, mockLogStep } = vi.hoisted(() => ({
  mockRunWorkflow: vi.fn(
    async (_query: string, _options?: RunWorkflowOptions): Promise<WorkflowRun> => ({
      state: { userInput: "" },
      steps: [],
    }),
  ),
  mockLogAgentRun: vi.fn(async (_params: unknown): Promise<void> => {}),
  mockLogStep: vi.fn(),
}));

vi.mock("../workflow", () => ({ runWorkflow: mockRunWorkflow }));
vi.mock("@/lib/logging/agent", () => ({
  logAgentRun: mockLogAgentRun,
  logStep: mockLogStep,
}));

// eslint-disable-next-line import/first
import { runMusicAgent } from "../runMusicAgent";

const FINAL: WorkflowState = {
  userInput: "Play Heroes",
  queryType: "track",
  extractedTitle: "Heroes",
  extractedArtist: "David Bowie",
  dbResult: [],
};

describe("runMusicAgent", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("returns the final state and forwards step reports", async () => {
    vi.stubEnv("AGENT_LOG_RUNS", "");
    mockRunWorkflow.mockImplementationOnce(async (query, options) => {
      options?.onStep?.({ step: "DetectType", durationMs: 1, state: { userInput: query } });
      return { state: FINAL, steps: ["DetectType"] };
    });

    await expect(runMusicAgent("Play Heroes")).resolves.toEqual(FINAL);
    expect(mockLogStep).toHaveBeenCalledTimes(1);
    expect(mockLogAgentRun).not.toHaveBeenCalled();
  });

  it("writes a run log entry when enabled", async () => {
    vi.stubEnv("AGENT_LOG_RUNS", "1");
    mockRunWorkflow.mockResolvedValueOnce({
      state: FINAL,
      steps: ["DetectType", "DBSearch", "WebSearch", "LyricsSearch"],
    });

    await runMusicAgent("Play Heroes");

    expect(mockLogAgentRun).toHaveBeenCalledWith({
      query: "Play Heroes",
      state: FINAL,
      steps: ["DetectType", "DBSearch", "WebSearch", "LyricsSearch"],
    });
  });

  it("logs the completed steps of a failed run and rethrows", async () => {
    vi.stubEnv("AGENT_LOG_RUNS", "true");
    const failure = new SearchError("HTTP 500", 500);
    mockRunWorkflow.mockImplementationOnce(async (query, options) => {
      options?.onStep?.({ step: "DetectType", durationMs: 1, state: { userInput: query } });
      throw failure;
    });

    await expect(runMusicAgent("Who is Freddie Mercury")).rejects.toBe(failure);
    expect(mockLogAgentRun).toHaveBeenCalledWith({
      query: "Who is Freddie Mercury",
      state: null,
      steps: ["DetectType"],
      error: failure,
    });
  });
});
