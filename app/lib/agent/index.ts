/**
 * Music Agent Module
 *
 * Main entry point for the query routing workflow
 */

export { runMusicAgent } from "./runMusicAgent";
export type {
  QueryType,
  StepReport,
  Track,
  WorkflowRun,
  WorkflowState,
  WorkflowStep,
} from "./types";

// Export individual modules for testing/debugging
export * from "./errors";
export * from "./workflow";
export * from "./classifyIntent";
export * from "./resolveTrack";
export * from "./webFallback";
export * from "./normalizeLyrics";
export * from "./trivia";
export * from "./extract";
