import { NextResponse } from "next/server";

import { runMusicAgent } from "@/lib/agent";
import { isAgentError } from "@/lib/agent/errors";
import type { AgentResponse } from "@/lib/agent/types";

async function handleQuery(query: string | null | undefined) {
  const q = query?.trim();

  if (!q) {
    return NextResponse.json<AgentResponse>(
      { error: "Missing query" },
      { status: 400 },
    );
  }

  try {
    const state = await runMusicAgent(q);
    return NextResponse.json<AgentResponse>({
      state: { ...state, dbResult: state.dbResult ?? [] },
    });
  } catch (error) {
    console.error("Agent run failed:", error);
    if (isAgentError(error)) {
      return NextResponse.json<AgentResponse>(
        { error: error.message, code: error.code },
        { status: 502 },
      );
    }
    return NextResponse.json<AgentResponse>(
      { error: "Internal server error" },
      { status: 500 },
    );
  }
}

export async function GET(req: Request) {
  const { searchParams } = new URL(req.url);
  return handleQuery(searchParams.get("q"));
}

export async function POST(req: Request) {
  const body: unknown = await req.json().catch(() => null);
  const query =
    typeof body === "object" && body !== null && "query" in body
      ? body.query
      : null;
  return handleQuery(typeof query === "string" ? query : null);
}
