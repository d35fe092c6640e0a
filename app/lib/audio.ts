import { extname } from "path";

const AUDIO_CONTENT_TYPES: Record<string, string> = {
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".ogg": "audio/ogg",
  ".m4a": "audio/mp4",
  ".flac": "audio/flac",
};

export function audioContentType(filePath: string): string {
  return AUDIO_CONTENT_TYPES[extname(filePath).toLowerCase()] ?? "audio/mpeg";
}

export interface ByteRange {
  start: number;
  end: number;
}

const RANGE_PATTERN = /^bytes=(\d*)-(\d*)$/;

/**
 * Reads a single-range `Range` header against a file of `size` bytes.
 *
 * Returns null when the whole file should be sent (no header, or a form we do
 * not serve such as multiple ranges) and "unsatisfiable" for a range that lies
 * outside the file. `end` is inclusive.
 */
export function parseByteRange(
  header: string | null,
  size: number,
): ByteRange | "unsatisfiable" | null {
  if (!header) return null;
  const match = RANGE_PATTERN.exec(header.trim());
  if (!match) return null;

  const [, rawStart = "", rawEnd = ""] = match;
  if (!rawStart && !rawEnd) return null;

  if (!rawStart) {
    // Suffix form: the last N bytes.
    const suffix = Number(rawEnd);
    if (suffix === 0 || size === 0) return "unsatisfiable";
    return { start: Math.max(0, size - suffix), end: size - 1 };
  }

  const start = Number(rawStart);
  const end = rawEnd ? Math.min(Number(rawEnd), size - 1) : size - 1;
  if (start >= size || (rawEnd && Number(rawEnd) < start)) {
    return "unsatisfiable";
  }
  return { start, end };
}
