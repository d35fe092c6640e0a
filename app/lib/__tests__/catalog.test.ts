import { createClient, type Client } from "@libsql/client";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  CatalogQueryError,
  CatalogUnavailableError,
} from "../agent/errors";

const testDb = vi.hoisted(() => {
  const holder: { client: Client | null; failWith: Error | null } = {
    client: null,
    failWith: null,
  };
  return holder;
});

vi.mock("@/lib/db", () => ({
  getDb: () => {
    if (testDb.failWith) throw testDb.failWith;
    if (!testDb.client) throw new Error("test database not initialised");
    return testDb.client;
  },
}));

// eslint-disable-next-line import/first
import { findTrackByAudioPath, lookupTracks } from "../catalog";

const ROWS: Array<[string, string, string, string | null]> = [
  ["Bohemian Rhapsody", "Queen", "music/bohemian.mp3", "Is this the real life?"],
  ["Yesterday", "The Beatles", "music/yesterday.mp3", null],
  ["Under Pressure", "Queen & David Bowie", "music/pressure.mp3", "Pressure pushing down"],
  ["Heroes", "David Bowie", "music/heroes.mp3", null],
  ["Yesterday", "The Beatles", "music/yesterday-remaster.mp3", "All my troubles"],
];

async function seed(client: Client): Promise<void> {
  await client.execute(
    "CREATE TABLE tracks (title TEXT, artist TEXT, file_path TEXT, lyrics TEXT)",
  );
  for (const [title, artist, filePath, lyrics] of ROWS) {
    await client.execute({
      sql: "INSERT INTO tracks (title, artist, file_path, lyrics) VALUES (?, ?, ?, ?)",
      args: [title, artist, filePath, lyrics],
    });
  }
}

describe("lookupTracks", () => {
  beforeEach(async () => {
    testDb.failWith = null;
    testDb.client = createClient({ url: ":memory:" });
    await seed(testDb.client);
  });

  afterEach(() => {
    testDb.client?.close();
    testDb.client = null;
  });

  it("returns nothing and skips the query when no fragment is given", async () => {
    testDb.failWith = new Error("catalog should not be touched");

    await expect(lookupTracks()).resolves.toEqual([]);
    await expect(lookupTracks(null, null)).resolves.toEqual([]);
    await expect(lookupTracks("", "")).resolves.toEqual([]);
  });

  it("matches title substrings and maps rows to tracks", async () => {
    const tracks = await lookupTracks("Rhapsody");

    expect(tracks).toEqual([
      {
        title: "Bohemian Rhapsody",
        artist: "Queen",
        filePath: "music/bohemian.mp3",
        lyrics: "Is this the real life?",
      },
    ]);
  });

  it("keeps null lyrics and duplicate title/artist pairs in storage order", async () => {
    const tracks = await lookupTracks("Yesterday", null);

    expect(tracks.map((t) => t.filePath)).toEqual([
      "music/yesterday.mp3",
      "music/yesterday-remaster.mp3",
    ]);
    expect(tracks[0]?.lyrics).toBeNull();
  });

  it("ORs the title and artist conditions", async () => {
    // Title matches nothing by Queen, artist matches nothing titled Heroes;
    // both rows still come back.
    const tracks = await lookupTracks("Heroes", "Queen");

    expect(tracks.map((t) => t.title)).toEqual([
      "Bohemian Rhapsody",
      "Under Pressure",
      "Heroes",
    ]);
  });

  it("returns rows matching only the artist when the title misses", async () => {
    const tracks = await lookupTracks("Not A Real Song", "David Bowie");

    expect(tracks.map((t) => t.title)).toEqual(["Under Pressure", "Heroes"]);
  });

  it("uses SQL LIKE matching, which ignores ASCII case", async () => {
    const tracks = await lookupTracks("bohemian");

    expect(tracks).toHaveLength(1);
    expect(tracks[0]?.title).toBe("Bohemian Rhapsody");
  });

  it("raises CatalogQueryError when the query fails", async () => {
    await testDb.client?.execute("DROP TABLE tracks");

    await expect(lookupTracks("Heroes")).rejects.toBeInstanceOf(CatalogQueryError);
  });

  it("propagates CatalogUnavailableError from the connection", async () => {
    testDb.failWith = new CatalogUnavailableError("cannot open");

    await expect(lookupTracks("Heroes")).rejects.toBeInstanceOf(
      CatalogUnavailableError,
    );
  });
});

describe("findTrackByAudioPath", () => {
  beforeEach(async () => {
    testDb.failWith = null;
    testDb.client = createClient({ url: ":memory:" });
    await seed(testDb.client);
  });

  afterEach(() => {
    testDb.client?.close();
    testDb.client = null;
  });

  it("finds a track by its exact file path", async () => {
    const track = await findTrackByAudioPath("music/heroes.mp3");

    expect(track).toEqual({
      title: "Heroes",
      artist: "David Bowie",
      filePath: "music/heroes.mp3",
      lyrics: null,
    });
  });

  it("returns null for paths outside the catalog", async () => {
    await expect(findTrackByAudioPath("../etc/passwd")).resolves.toBeNull();
    await expect(findTrackByAudioPath("")).resolves.toBeNull();
  });
});
