import { describe, expect, it } from "vitest";
import { ALLOWED_LINK_PREFIXES } from "../../src/fun-half/fun-half-config.js";
import { extractLink, extractLinkFromText, findLinkInMetadata, normalizeVideoUrl } from "../../src/fun-half/link-extractor.js";
import { createTestLogger, FakeVideoProvider } from "../test-utils.js";

const options = { allowedPrefixes: ALLOWED_LINK_PREFIXES, maxComments: 50 };

describe("normalizeVideoUrl", () => {
  it("rewrites watch links to the live form", () => {
    expect(normalizeVideoUrl("https://www.youtube.com/watch?v=abc123XYZ&t=42")).toBe("https://youtube.com/live/abc123XYZ");
  });

  it("strips query strings and fragments", () => {
    expect(normalizeVideoUrl("https://youtu.be/abc123XYZ?si=share")).toBe("https://youtu.be/abc123XYZ");
    expect(normalizeVideoUrl("https://www.youtube.com/live/abc123XYZ#chat")).toBe("https://www.youtube.com/live/abc123XYZ");
  });
});

describe("extractLinkFromText", () => {
  it("finds a watch link on a fun-half line", () => {
    expect(extractLinkFromText("check out the fun-half: https://youtube.com/watch?v=abc123XYZ", ALLOWED_LINK_PREFIXES)).toBe(
      "https://youtube.com/live/abc123XYZ"
    );
  });

  it("tolerates case, dash variants and spacing", () => {
    expect(extractLinkFromText("FUN – HALF https://youtu.be/abcdef1", ALLOWED_LINK_PREFIXES)).toBe("https://youtu.be/abcdef1");
    expect(extractLinkFromText("Fun   Half here: https://www.youtube.com/live/XYZ98765?si=abc", ALLOWED_LINK_PREFIXES)).toBe(
      "https://www.youtube.com/live/XYZ98765"
    );
  });

  it("only reads lines that mention the fun half", () => {
    const text = ["Full show: https://youtu.be/aaaaaa1", "Fun half starts here https://youtu.be/bbbbbb2"].join("\n");

    expect(extractLinkFromText(text, ALLOWED_LINK_PREFIXES)).toBe("https://youtu.be/bbbbbb2");
  });

  it("returns nothing when the phrase and the link are on different lines", () => {
    expect(extractLinkFromText("Fun half below\nhttps://youtu.be/abcdef1", ALLOWED_LINK_PREFIXES)).toBeUndefined();
  });

  it("splits lines on carriage returns and unicode separators", () => {
    expect(extractLinkFromText("Full show https://youtu.be/aaaaaa1\rFun half https://youtu.be/bbbbbb2", ALLOWED_LINK_PREFIXES)).toBe(
      "https://youtu.be/bbbbbb2"
    );
    expect(extractLinkFromText("Fun half below\u2028https://youtu.be/abcdef1", ALLOWED_LINK_PREFIXES)).toBeUndefined();
    expect(extractLinkFromText("Fun half below\u2029https://youtu.be/abcdef1", ALLOWED_LINK_PREFIXES)).toBeUndefined();
  });

  it("rejects links outside the allowed prefixes", () => {
    expect(extractLinkFromText("fun half http://youtu.be/abcdef1", ALLOWED_LINK_PREFIXES)).toBeUndefined();
    expect(extractLinkFromText("fun half https://www.youtube.com/live/abcdef1", ["https://youtu.be/"])).toBeUndefined();
  });

  it("continues to the next link on the line when one is rejected", () => {
    expect(extractLinkFromText("fun half http://youtu.be/abcdef1 or https://youtu.be/ghijkl2", ALLOWED_LINK_PREFIXES)).toBe(
      "https://youtu.be/ghijkl2"
    );
  });

  it("ignores ids shorter than six characters", () => {
    expect(extractLinkFromText("fun half https://youtu.be/abc", ALLOWED_LINK_PREFIXES)).toBeUndefined();
  });

  it("returns nothing for empty text", () => {
    expect(extractLinkFromText("", ALLOWED_LINK_PREFIXES)).toBeUndefined();
    expect(extractLinkFromText(undefined, ALLOWED_LINK_PREFIXES)).toBeUndefined();
  });
});

describe("findLinkInMetadata", () => {
  const descriptionLink = "Fun Half: https://youtu.be/desc001";
  const pinnedLink = "Fun Half: https://youtu.be/pinned1";
  const commentLink = "Fun Half: https://youtu.be/comment1";

  it("prefers the description", () => {
    const link = findLinkInMetadata(
      {
        description: descriptionLink,
        comments: [
          { text: commentLink, pinned: false },
          { text: pinnedLink, pinned: true },
        ],
      },
      options
    );

    expect(link).toBe("https://youtu.be/desc001");
  });

  it("prefers the pinned comment over earlier comments", () => {
    const link = findLinkInMetadata(
      {
        description: "No link today",
        comments: [
          { text: commentLink, pinned: false },
          { text: pinnedLink, pinned: true },
        ],
      },
      options
    );

    expect(link).toBe("https://youtu.be/pinned1");
  });

  it("falls back to the first matching comment", () => {
    const link = findLinkInMetadata(
      {
        description: "",
        comments: [
          { text: "great show", pinned: true },
          { text: "first!", pinned: false },
          { text: commentLink, pinned: false },
        ],
      },
      options
    );

    expect(link).toBe("https://youtu.be/comment1");
  });

  it("only scans the first comments", () => {
    const link = findLinkInMetadata(
      {
        description: "",
        comments: [
          { text: "first!", pinned: false },
          { text: commentLink, pinned: false },
        ],
      },
      { ...options, maxComments: 1 }
    );

    expect(link).toBeUndefined();
  });
});

describe("extractLink", () => {
  it("fetches the video once and searches its metadata", async () => {
    const videoUrl = "https://www.youtube.com/watch?v=live001";
    const provider = new FakeVideoProvider([], {
      [videoUrl]: { description: "", comments: [{ text: pinnedText(), pinned: true }] },
    });

    const link = await extractLink(provider, videoUrl, options, createTestLogger());

    expect(link).toBe("https://youtube.com/live/fh00001");
    expect(provider.fetchedUrls).toEqual([videoUrl]);
  });

  it("returns nothing when the video has no link", async () => {
    const provider = new FakeVideoProvider([]);

    expect(await extractLink(provider, "https://youtu.be/other01", options, createTestLogger())).toBeUndefined();
  });
});

function pinnedText(): string {
  return "Timestamps\nThe Fun-Half: https://www.youtube.com/watch?v=fh00001&t=10";
}
