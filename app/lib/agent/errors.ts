export type AgentErrorCode =
  | "configuration"
  | "catalog_unavailable"
  | "catalog_query"
  | "model_invocation"
  | "search";

/**
 * Base class for every failure that aborts a workflow run.
 * "No match" is never one of these: empty results are valid state.
 */
export class AgentError extends Error {
  constructor(
    message: string,
    public readonly code: AgentErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "AgentError";
  }
}

export class ConfigurationError extends AgentError {
  constructor(message: string) {
    super(message, "configuration");
    this.name = "ConfigurationError";
  }
}

export class CatalogUnavailableError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "catalog_unavailable", options);
    this.name = "CatalogUnavailableError";
  }
}

export class CatalogQueryError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "catalog_query", options);
    this.name = "CatalogQueryError";
  }
}

export class ModelInvocationError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "model_invocation", options);
    this.name = "ModelInvocationError";
  }
}

export class SearchError extends AgentError {
  constructor(
    message: string,
    public readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, "search", options);
    this.name = "SearchError";
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
