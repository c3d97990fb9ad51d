import type { ILogger } from "../common/logger.types.js";
import type { VideoMetadata } from "./fun-half.types.js";
import type { VideoProvider } from "./video-provider.types.js";

// "fun half", "Fun-Half", "FUN – HALF", ...
const FUN_HALF_PATTERN = /fun\s*[-\u2010-\u2015\u2212]?\s*half/i;
const VIDEO_URL_PATTERN = /https?:\/\/(?:www\.)?(?:youtube\.com\/live\/|youtu\.be\/|youtube\.com\/watch\?v=)[A-Za-z0-9_-]{6,}/g;
const WATCH_ID_PATTERN = /[?&]v=([A-Za-z0-9_-]+)/;
const CANONICAL_LIVE_PREFIX = "https://youtube.com/live/";

export interface LinkSearchOptions {
  allowedPrefixes: readonly string[];
  maxComments: number;
}

/**
 * Strips query and fragment suffixes, and rewrites `watch?v=<id>` links to the `live/<id>` form.
 */
export function normalizeVideoUrl(url: string): string {
  if (url.includes("watch") && url.includes("v=")) {
    const match = url.match(WATCH_ID_PATTERN);
    if (match) {
      return `${CANONICAL_LIVE_PREFIX}${match[1]}`;
    }
  }

  return url.split(/[?&#]/, 1)[0];
}

/**
 * Finds the first allow-listed video link on a line that mentions the Fun Half.
 */
export function extractLinkFromText(text: string | undefined, allowedPrefixes: readonly string[]): string | undefined {
  if (!text) {
    return undefined;
  }

  for (const rawLine of text.split(/\r\n|[\n\r\u2028\u2029\x85]/)) {
    const line = rawLine.trim();
    if (!FUN_HALF_PATTERN.test(line)) {
      continue;
    }

    for (const [candidate] of line.matchAll(VIDEO_URL_PATTERN)) {
      const normalized = normalizeVideoUrl(candidate);
      if (allowedPrefixes.some((prefix) => normalized.startsWith(prefix))) {
        return normalized;
      }
    }
  }

  return undefined;
}

/**
 * Searches the description, then the pinned comment, then the leading comments. First match wins.
 */
export function findLinkInMetadata(metadata: VideoMetadata, options: LinkSearchOptions): string | undefined {
  const fromDescription = extractLinkFromText(metadata.description, options.allowedPrefixes);
  if (fromDescription) {
    return fromDescription;
  }

  const pinned = metadata.comments.find((comment) => comment.pinned);
  if (pinned) {
    const fromPinned = extractLinkFromText(pinned.text, options.allowedPrefixes);
    if (fromPinned) {
      return fromPinned;
    }
  }

  for (const comment of metadata.comments.slice(0, options.maxComments)) {
    const fromComment = extractLinkFromText(comment.text, options.allowedPrefixes);
    if (fromComment) {
      return fromComment;
    }
  }

  return undefined;
}

/**
 * Fetches a video's description and comments and returns its Fun Half link, if one is posted.
 * Provider failures propagate.
 */
export async function extractLink(
  provider: VideoProvider,
  videoUrl: string,
  options: LinkSearchOptions,
  logger: ILogger
): Promise<string | undefined> {
  const metadata = await provider.fetchVideoMetadata(videoUrl);
  logger.debug(`Fetched metadata for ${videoUrl}: ${metadata.description.length} description chars, ${metadata.comments.length} comments`);

  const link = findLinkInMetadata(metadata, options);
  if (link) {
    logger.info(`Found Fun Half link ${link} in ${videoUrl}`);
  } else {
    logger.info(`No Fun Half link in ${videoUrl}`);
  }

  return link;
}
