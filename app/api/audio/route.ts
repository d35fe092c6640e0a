import { open, type FileHandle } from "fs/promises";
import { resolve } from "path";
import { NextResponse } from "next/server";

import { findTrackByAudioPath } from "@/lib/catalog";
import { isAgentError } from "@/lib/agent/errors";
import { audioContentType, parseByteRange } from "@/lib/audio";

function notFound(path: string) {
  return NextResponse.json(
    { error: `Audio file not found: ${path}` },
    { status: 404 },
  );
}

/**
 * Serves a catalog track's audio. Only paths stored in the catalog are served.
 * A single `Range` is answered with 206 so players can seek.
 */
export async function GET(req: Request) {
  const { searchParams } = new URL(req.url);
  const path = searchParams.get("path");

  if (!path) {
    return NextResponse.json(
      { error: "Missing query parameter 'path'" },
      { status: 400 },
    );
  }

  try {
    const track = await findTrackByAudioPath(path);
    if (!track) return notFound(path);

    let file: FileHandle;
    try {
      file = await open(resolve(process.cwd(), track.filePath), "r");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return notFound(path);
      }
      throw error;
    }

    try {
      const { size } = await file.stat();
      const contentType = audioContentType(track.filePath);
      const range = parseByteRange(req.headers.get("range"), size);

      if (range === "unsatisfiable") {
        return new NextResponse(null, {
          status: 416,
          headers: { "Content-Range": `bytes */${size}` },
        });
      }

      const start = range ? range.start : 0;
      const length = range ? range.end - range.start + 1 : size;
      const data = new Uint8Array(length);
      if (length > 0) {
        await file.read(data, 0, length, start);
      }

      const headers: Record<string, string> = {
        "Content-Type": contentType,
        "Content-Length": String(length),
        "Accept-Ranges": "bytes",
      };
      if (range) {
        headers["Content-Range"] = `bytes ${range.start}-${range.end}/${size}`;
      }

      return new NextResponse(data, { status: range ? 206 : 200, headers });
    } finally {
      await file.close();
    }
  } catch (error) {
    console.error("Audio lookup failed:", error);
    if (isAgentError(error)) {
      return NextResponse.json(
        { error: error.message, code: error.code },
        { status: 502 },
      );
    }
    return NextResponse.json(
      { error: "Internal server error" },
      { status: 500 },
    );
  }
}
