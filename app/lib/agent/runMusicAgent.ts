import { isRunLogEnabled } from "@/lib/config";
import { logAgentRun, logStep } from "@/lib/logging/agent";
import type { WorkflowState } from "./types";
import { runWorkflow } from "./workflow";

/**
 * Runs the full routing workflow for one query and returns the final state.
 * Errors from any node reach the caller unchanged.
 */
export async function runMusicAgent(query: string): Promise<WorkflowState> {
  const steps: string[] = [];
  const logRun = isRunLogEnabled();

  try {
    const run = await runWorkflow(query, {
      onStep: (report) => {
        steps.push(report.step);
        logStep(report);
      },
    });
    if (logRun) {
      await logAgentRun({ query, state: run.state, steps: run.steps });
    }
    return run.state;
  } catch (error) {
    if (logRun) {
      await logAgentRun({ query, state: null, steps, error });
    }
    throw error;
  }
}
