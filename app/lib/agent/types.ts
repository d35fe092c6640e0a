/**
 * Core data types for the music agent workflow
 */

/**
 * One catalog row. Identity is positional: the same title/artist pair can
 * appear more than once.
 */
export interface Track {
  title: string;
  artist: string;
  filePath: string;
  lyrics: string | null;
}

export type QueryType = "trivia" | "track";

/**
 * Accumulated record threaded through the workflow.
 * `userInput` is set once at the start and never changes.
 */
export interface WorkflowState {
  userInput: string;
  queryType?: QueryType;
  extractedTitle?: string | null;
  extractedArtist?: string | null;
  dbResult?: Track[];
  trivia?: string;
}

/**
 * What a single node hands back: only the fields it sets.
 */
export type StateUpdate = Partial<Omit<WorkflowState, "userInput">>;

export interface TrackExtraction {
  title: string | null;
  artist: string | null;
}

export interface TrackResolution extends TrackExtraction {
  tracks: Track[];
}

export type WorkflowStep =
  | "DetectType"
  | "TriviaSearch"
  | "DBSearch"
  | "WebSearch"
  | "LyricsSearch"
  | "END";

export interface StepReport {
  step: Exclude<WorkflowStep, "END">;
  durationMs: number;
  state: WorkflowState;
}

export interface WorkflowRun {
  state: WorkflowState;
  steps: StepReport["step"][];
}

/**
 * Payload of /api/agent. `dbResult` is always present on success.
 */
export type AgentResponseState = WorkflowState & { dbResult: Track[] };

export type AgentResponse =
  | { state: AgentResponseState }
  | { error: string; code?: string };
