import { DETECT_INTENT_TEMPLATE } from "@/lib/prompts";
import { invokeModel } from "./llm";
import type { QueryType } from "./types";

/**
 * Labels the input as trivia or a track request. Anything that does not
 * mention "trivia" counts as a track request.
 */
export async function classifyIntent(userInput: string): Promise<QueryType> {
  const response = await invokeModel(DETECT_INTENT_TEMPLATE(userInput));
  return response.toLowerCase().includes("trivia") ? "trivia" : "track";
}
