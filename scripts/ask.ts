/**
 * Terminal front-end for the music agent.
 *
 * Usage: npm run ask -- "Play Bohemian Rhapsody"
 * Without an argument it prompts for a question.
 */

import { createInterface } from "node:readline/promises";
import { stdin, stdout } from "node:process";

import { runMusicAgent } from "@/lib/agent";
import { formatAnswer } from "@/lib/agent/formatAnswer";

async function readQuery(): Promise<string> {
  const fromArgs = process.argv.slice(2).join(" ").trim();
  if (fromArgs) return fromArgs;

  const rl = createInterface({ input: stdin, output: stdout });
  try {
    return (await rl.question("Ask a music question: ")).trim();
  } finally {
    rl.close();
  }
}

async function main(): Promise<void> {
  const query = await readQuery();
  if (!query) {
    console.error("No question given.");
    process.exitCode = 1;
    return;
  }

  const state = await runMusicAgent(query);
  console.log(formatAnswer(state));
}

main().catch((error: unknown) => {
  console.error("Agent run failed:", error);
  process.exitCode = 1;
});
