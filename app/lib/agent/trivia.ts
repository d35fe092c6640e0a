import { TRIVIA_ANSWER_TEMPLATE } from "@/lib/prompts";
import { invokeModel } from "./llm";
import { runWebSearch } from "./webSearch";

/**
 * One search on the raw question, one model call to phrase the answer.
 */
export async function answerTrivia(userInput: string): Promise<string> {
  const results = await runWebSearch(userInput);
  const response = await invokeModel(TRIVIA_ANSWER_TEMPLATE(userInput, results));
  return response.trim();
}
