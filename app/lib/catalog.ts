import type { Row } from "@libsql/client";

import { getDb } from "@/lib/db";
import { CatalogQueryError, describeError } from "@/lib/agent/errors";
import type { Track } from "@/lib/agent/types";

const TRACK_COLUMNS = "title, artist, file_path, lyrics";

const toText = (value: unknown): string =>
  typeof value === "string" ? value : value == null ? "" : String(value);

const toNullableText = (value: unknown): string | null =>
  typeof value === "string" ? value : null;

const mapTrack = (row: Row): Track => ({
  title: toText(row.title),
  artist: toText(row.artist),
  filePath: toText(row.file_path),
  lyrics: toNullableText(row.lyrics),
});

// An unreachable catalog fails inside getDb(), before any query runs.
async function queryTracks(sql: string, args: string[]): Promise<Row[]> {
  const db = getDb();
  try {
    const result = await db.execute({ sql, args });
    return result.rows;
  } catch (error) {
    throw new CatalogQueryError(
      `Catalog query failed: ${describeError(error)}`,
      { cause: error },
    );
  }
}

/**
 * Finds every track whose title contains `title` OR whose artist contains
 * `artist`. The conditions are OR-ed, so a mismatched artist can still pull
 * in rows that only match on title (and vice versa).
 *
 * With neither fragment supplied the catalog is not queried at all.
 */
export async function lookupTracks(
  title?: string | null,
  artist?: string | null,
): Promise<Track[]> {
  const conditions: string[] = [];
  const args: string[] = [];

  if (title) {
    conditions.push("title LIKE ?");
    args.push(`%${title}%`);
  }
  if (artist) {
    conditions.push("artist LIKE ?");
    args.push(`%${artist}%`);
  }

  if (conditions.length === 0) return [];

  const rows = await queryTracks(
    `SELECT ${TRACK_COLUMNS} FROM tracks WHERE ${conditions.join(" OR ")}`,
    args,
  );
  return rows.map(mapTrack);
}

export async function findTrackByAudioPath(
  filePath: string,
): Promise<Track | null> {
  if (!filePath) return null;
  const rows = await queryTracks(
    `SELECT ${TRACK_COLUMNS} FROM tracks WHERE file_path = ? LIMIT 1`,
    [filePath],
  );
  const row = rows[0];
  return row ? mapTrack(row) : null;
}
