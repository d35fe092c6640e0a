/**
 * llm.ts
 *
 * Single entry point for language-model calls. Every node sends one user
 * message and reads back free text; no structured output is requested.
 */

import OpenAI, { AzureOpenAI } from "openai";

import {
  LLM_TEMPERATURE,
  getModelProviderConfig,
  type ModelProviderConfig,
} from "@/lib/config";
import { describeError, ModelInvocationError } from "./errors";

interface ChatClient {
  client: OpenAI;
  model: string;
}

let cachedClient: ChatClient | null = null;

function buildClient(config: ModelProviderConfig): ChatClient {
  if (config.provider === "azure") {
    return {
      client: new AzureOpenAI({
        endpoint: config.endpoint,
        apiKey: config.apiKey,
        deployment: config.deployment,
        apiVersion: config.apiVersion,
      }),
      model: config.deployment,
    };
  }

  return {
    client: new OpenAI({ apiKey: config.apiKey }),
    model: config.model,
  };
}

function getChatClient(): ChatClient {
  if (!cachedClient) {
    cachedClient = buildClient(getModelProviderConfig());
  }
  return cachedClient;
}

/**
 * Sends `prompt` as a single user message and returns the reply text.
 */
export async function invokeModel(prompt: string): Promise<string> {
  const { client, model } = getChatClient();

  try {
    const response = await client.chat.completions.create({
      model,
      temperature: LLM_TEMPERATURE,
      messages: [{ role: "user", content: prompt }],
    });
    return response.choices[0]?.message.content ?? "";
  } catch (error) {
    throw new ModelInvocationError(
      `Language model call failed: ${describeError(error)}`,
      { cause: error },
    );
  }
}
