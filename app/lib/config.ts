import { ConfigurationError } from "./agent/errors";

export const OPENAI_MODEL = process.env.OPENAI_MODEL ?? "gpt-4o-mini";
export const LLM_TEMPERATURE = 0;

export const AZURE_API_VERSION =
  process.env.AZURE_OPENAI_API_VERSION ?? "2024-02-01";

export const CATALOG_DATABASE_URL =
  process.env.CATALOG_DATABASE_URL ?? "file:music_library.db";

export const SERPAPI_ENDPOINT = "https://serpapi.com/search.json";

// Preview lengths for lyrics in the web UI and the terminal.
export const LYRICS_PREVIEW_CHARS = 1500;
export const CLI_LYRICS_PREVIEW_CHARS = 500;

export type ModelProviderConfig =
  | { provider: "openai"; apiKey: string; model: string }
  | {
      provider: "azure";
      endpoint: string;
      apiKey: string;
      deployment: string;
      apiVersion: string;
    };

function requireEnv(name: string): string {
  const value = process.env[name]?.trim();
  if (!value) {
    throw new ConfigurationError(`Missing ${name}`);
  }
  return value;
}

/**
 * Azure wins when AZURE_OPENAI_ENDPOINT is set; otherwise the public API.
 */
export function getModelProviderConfig(): ModelProviderConfig {
  const azureEndpoint = process.env.AZURE_OPENAI_ENDPOINT?.trim();
  if (azureEndpoint) {
    return {
      provider: "azure",
      endpoint: azureEndpoint,
      apiKey: requireEnv("AZURE_OPENAI_API_KEY"),
      deployment: requireEnv("AZURE_OPENAI_DEPLOYMENT"),
      apiVersion: AZURE_API_VERSION,
    };
  }

  return {
    provider: "openai",
    apiKey: requireEnv("OPENAI_API_KEY"),
    model: OPENAI_MODEL,
  };
}

export function getSerpApiKey(): string {
  return requireEnv("SERPAPI_API_KEY");
}

export function getCatalogAuthToken(): string | undefined {
  return process.env.CATALOG_AUTH_TOKEN || undefined;
}

export function isRunLogEnabled(): boolean {
  const flag = process.env.AGENT_LOG_RUNS;
  return flag === "1" || flag === "true";
}
