"use client";

import * as React from "react";

import type { AgentResponse, AgentResponseState } from "@/lib/agent/types";

export type AgentStatus = "idle" | "loading" | "done" | "error";

export function useMusicAgent() {
  const [state, setState] = React.useState<AgentResponseState | null>(null);
  const [status, setStatus] = React.useState<AgentStatus>("idle");
  const [error, setError] = React.useState<string | null>(null);
  const abortControllerRef = React.useRef<AbortController | null>(null);

  React.useEffect(() => {
    return () => {
      abortControllerRef.current?.abort();
    };
  }, []);

  const ask = React.useCallback(async (query: string): Promise<void> => {
    const trimmed = query.trim();
    if (!trimmed) return;

    // Abort any in-flight run; a new query replaces it entirely.
    abortControllerRef.current?.abort();
    const controller = new AbortController();
    abortControllerRef.current = controller;

    setStatus("loading");
    setError(null);
    setState(null);

    try {
      const res = await fetch("/api/agent", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ query: trimmed }),
        signal: controller.signal,
      });
      const json = (await res.json()) as AgentResponse;

      if (!res.ok || "error" in json) {
        throw new Error("error" in json ? json.error : "Request failed");
      }

      setState(json.state);
      setStatus("done");
    } catch (err) {
      if (controller.signal.aborted) return;
      setError(err instanceof Error ? err.message : "Request failed");
      setStatus("error");
    }
  }, []);

  return { state, status, error, ask };
}
