import { describe, expect, it } from "vitest";

import { audioContentType, parseByteRange } from "../audio";

describe("audioContentType", () => {
  it("maps known extensions regardless of case", () => {
    expect(audioContentType("music/heroes.MP3")).toBe("audio/mpeg");
    expect(audioContentType("music/take.flac")).toBe("audio/flac");
  });

  it("defaults to audio/mpeg", () => {
    expect(audioContentType("music/unknown.bin")).toBe("audio/mpeg");
  });
});

describe("parseByteRange", () => {
  it("sends the whole file without a usable header", () => {
    expect(parseByteRange(null, 100)).toBeNull();
    expect(parseByteRange("bytes=-", 100)).toBeNull();
    expect(parseByteRange("bytes=0-1,5-6", 100)).toBeNull();
    expect(parseByteRange("items=0-1", 100)).toBeNull();
  });

  it("reads closed and open-ended ranges", () => {
    expect(parseByteRange("bytes=0-9", 100)).toEqual({ start: 0, end: 9 });
    expect(parseByteRange("bytes=90-", 100)).toEqual({ start: 90, end: 99 });
  });

  it("clamps an end past the file to the last byte", () => {
    expect(parseByteRange("bytes=50-500", 100)).toEqual({ start: 50, end: 99 });
  });

  it("reads suffix ranges", () => {
    expect(parseByteRange("bytes=-10", 100)).toEqual({ start: 90, end: 99 });
    expect(parseByteRange("bytes=-500", 100)).toEqual({ start: 0, end: 99 });
  });

  it("flags ranges outside the file", () => {
    expect(parseByteRange("bytes=100-", 100)).toBe("unsatisfiable");
    expect(parseByteRange("bytes=9-3", 100)).toBe("unsatisfiable");
    expect(parseByteRange("bytes=-0", 100)).toBe("unsatisfiable");
    expect(parseByteRange("bytes=0-", 0)).toBe("unsatisfiable");
  });
});
