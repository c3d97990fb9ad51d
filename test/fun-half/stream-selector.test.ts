import { describe, expect, it } from "vitest";
import type { CandidateEntry } from "../../src/fun-half/fun-half.types.js";
import { isExcludedTitle, resolveVideoUrl, selectStream } from "../../src/fun-half/stream-selector.js";

const TARGET = "2026-01-06";

const candidate = (id: string, title: string, uploadDate: string | undefined, durationSeconds: number): CandidateEntry => ({
  id,
  url: `https://www.youtube.com/watch?v=${id}`,
  title,
  durationSeconds,
  uploadDate,
});

describe("selectStream", () => {
  it("picks the main show over a clip from the same day", () => {
    const selected = selectStream(
      [candidate("clip1", "Fun Half Clip", TARGET, 300), candidate("live1", "MR Live", TARGET, 9000)],
      TARGET
    );

    expect(selected).toEqual({
      id: "live1",
      url: "https://www.youtube.com/watch?v=live1",
      title: "MR Live",
      matchedDate: TARGET,
    });
  });

  it("returns nothing for no candidates", () => {
    expect(selectStream([], TARGET)).toBeUndefined();
  });

  it("never picks clips, members streams or premieres", () => {
    const selected = selectStream(
      [
        candidate("a", "MEMBERS ONLY after show", TARGET, 20000),
        candidate("b", "Premiere: documentary", TARGET, 15000),
        candidate("c", "Best CLIPS of the week", TARGET, 12000),
      ],
      TARGET
    );

    expect(selected).toBeUndefined();
  });

  it("prefers the longest same-day stream, keeping the first on ties", () => {
    const selected = selectStream(
      [
        candidate("short", "Trailer", TARGET, 60),
        candidate("first", "MR Live part 1", TARGET, 7200),
        candidate("second", "MR Live part 2", TARGET, 7200),
      ],
      TARGET
    );

    expect(selected?.id).toBe("first");
  });

  it("ignores longer streams from other dates when one exists on the target date", () => {
    const selected = selectStream(
      [candidate("old", "MR Live", "2026-01-05", 20000), candidate("today", "MR Live", TARGET, 100)],
      TARGET
    );

    expect(selected?.id).toBe("today");
  });

  it("falls back to the most recent earlier date, longest first", () => {
    const selected = selectStream(
      [
        candidate("older", "MR Live", "2026-01-02", 9000),
        candidate("monday-short", "MR Live short", "2026-01-05", 100),
        candidate("monday-long", "MR Live", "2026-01-05", 8000),
      ],
      TARGET
    );

    expect(selected).toEqual({
      id: "monday-long",
      url: "https://www.youtube.com/watch?v=monday-long",
      title: "MR Live",
      matchedDate: TARGET,
    });
  });

  it("skips later and undated candidates", () => {
    const selected = selectStream([candidate("future", "MR Live", "2026-01-07", 9000), candidate("undated", "MR Live", undefined, 9000)], TARGET);

    expect(selected).toBeUndefined();
  });
});

describe("isExcludedTitle", () => {
  it("matches excluded terms in any case", () => {
    expect(isExcludedTitle("Fun Half CLIP")).toBe(true);
    expect(isExcludedTitle("For Members")).toBe(true);
    expect(isExcludedTitle("premiere")).toBe(true);
    expect(isExcludedTitle("MR Live - January 6")).toBe(false);
  });
});

describe("resolveVideoUrl", () => {
  it("prefers the listed URL", () => {
    expect(resolveVideoUrl({ id: "abc123", url: "https://www.youtube.com/live/abc123" })).toBe("https://www.youtube.com/live/abc123");
  });

  it("builds a watch URL from the id", () => {
    expect(resolveVideoUrl({ id: "abc123" })).toBe("https://www.youtube.com/watch?v=abc123");
  });

  it("returns nothing without URL or id", () => {
    expect(resolveVideoUrl({})).toBeUndefined();
  });
});
