import { describe, expect, it } from "vitest";
import { loadFunHalfConfig, parseCutoff } from "../../src/fun-half/fun-half-config.js";

describe("loadFunHalfConfig", () => {
  it("uses defaults without environment", () => {
    const config = loadFunHalfConfig({});

    expect(config.timeZone).toBe("America/Detroit");
    expect(config.outputPath).toBe("public/funhalf.xml");
    expect(config.liveTabUrl).toBe("https://www.youtube.com/@samSeder/videos?view=2&live_view=502&sort=dd");
    expect(config.feed).toEqual({
      title: "Majority Report – Fun Half",
      link: "https://www.youtube.com/@samSeder",
      description: "Daily Fun Half links from MR Live",
      selfUrl: "https://example.github.io/fun-half-feed/funhalf.xml",
    });
    expect(config.allowedPrefixes).toEqual(["https://www.youtube.com/live/", "https://youtube.com/live/", "https://youtu.be/"]);
    expect(config.cutoff).toEqual({ hour: 12, minute: 25 });
    expect(config.maxComments).toBe(50);
    expect(config.ytDlpPath).toBe("yt-dlp");
    expect(config.debug).toBe(false);
  });

  it("reads environment variables", () => {
    const config = loadFunHalfConfig({
      FUN_HALF_TIME_ZONE: "Europe/Berlin",
      FUN_HALF_CHANNEL_HANDLE: "@testchannel",
      FUN_HALF_CUTOFF: "09:05",
      FUN_HALF_DEBUG: "true",
    });

    expect(config.timeZone).toBe("Europe/Berlin");
    expect(config.liveTabUrl).toBe("https://www.youtube.com/@testchannel/videos?view=2&live_view=502&sort=dd");
    expect(config.feed.link).toBe("https://www.youtube.com/@testchannel");
    expect(config.cutoff).toEqual({ hour: 9, minute: 5 });
    expect(config.debug).toBe(true);
  });

  it("lets explicit overrides win over the environment", () => {
    const config = loadFunHalfConfig({ FUN_HALF_OUTPUT_PATH: "from-env.xml" }, { outputPath: "from-cli.xml", timeZone: undefined });

    expect(config.outputPath).toBe("from-cli.xml");
    expect(config.timeZone).toBe("America/Detroit");
  });

  it("rejects unknown time zones", () => {
    expect(() => loadFunHalfConfig({ FUN_HALF_TIME_ZONE: "Mars/Olympus" })).toThrow("Unknown time zone: Mars/Olympus");
  });

  it("rejects malformed cutoffs", () => {
    expect(() => loadFunHalfConfig({ FUN_HALF_CUTOFF: "25:00" })).toThrow("Cutoff must be HH:MM");
  });

  it("returns a frozen config", () => {
    const config = loadFunHalfConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.feed)).toBe(true);
  });
});

describe("parseCutoff", () => {
  it("parses HH:MM", () => {
    expect(parseCutoff("12:25")).toEqual({ hour: 12, minute: 25 });
  });

  it("throws on anything else", () => {
    expect(() => parseCutoff("noon")).toThrow("Invalid cutoff time: noon");
  });
});
