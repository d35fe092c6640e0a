import { afterEach, describe, expect, it, vi } from "vitest";

import { ConfigurationError } from "../agent/errors";
import { getModelProviderConfig, isRunLogEnabled } from "../config";

describe("getModelProviderConfig", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("uses the public API when no Azure endpoint is set", () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "");
    vi.stubEnv("OPENAI_API_KEY", "test-secret");

    expect(getModelProviderConfig()).toMatchObject({
      provider: "openai",
      apiKey: "test-secret",
    });
  });

  it("switches to Azure when the endpoint is set", () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "https://example.openai.azure.com");
    vi.stubEnv("AZURE_OPENAI_API_KEY", "test-secret");
    vi.stubEnv("AZURE_OPENAI_DEPLOYMENT", "chat");

    expect(getModelProviderConfig()).toEqual({
      provider: "azure",
      endpoint: "https://example.openai.azure.com",
      apiKey: "test-secret",
      deployment: "chat",
      apiVersion: "2024-02-01",
    });
  });

  it("names the missing variable", () => {
    vi.stubEnv("AZURE_OPENAI_ENDPOINT", "");
    vi.stubEnv("OPENAI_API_KEY", "");

    expect(() => getModelProviderConfig()).toThrow(ConfigurationError);
    expect(() => getModelProviderConfig()).toThrow("Missing OPENAI_API_KEY");
  });
});

describe("isRunLogEnabled", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("accepts 1 and true only", () => {
    vi.stubEnv("AGENT_LOG_RUNS", "1");
    expect(isRunLogEnabled()).toBe(true);
    vi.stubEnv("AGENT_LOG_RUNS", "true");
    expect(isRunLogEnabled()).toBe(true);
    vi.stubEnv("AGENT_LOG_RUNS", "yes");
    expect(isRunLogEnabled()).toBe(false);
  });
});
