import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname, join } from "path";

export const LOGS_DIR = join(process.cwd(), "logs");

export async function readJsonlLines(filePath: string): Promise<string[]> {
  try {
    const raw = await readFile(filePath, "utf8");
    return raw
      .split("\n")
      .map((l) => l.trim())
      .filter(Boolean);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw error;
  }
}

/**
 * Writes a JSONL file capped to the last N entries.
 *
 * Each entry is single-line JSON so the cap can work on line count.
 */
export async function writeJsonlCapped(params: {
  filePath: string;
  entry: unknown;
  maxEntries?: number;
}): Promise<void> {
  const { filePath, entry, maxEntries = 3 } = params;
  await mkdir(dirname(filePath), { recursive: true });

  const existing = await readJsonlLines(filePath);
  const next = [
    ...existing.slice(Math.max(0, existing.length - (maxEntries - 1))),
    JSON.stringify(entry),
  ];
  await writeFile(filePath, next.join("\n") + "\n", { flag: "w" });
}
