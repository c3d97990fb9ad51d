import { z } from "zod";
import { isUndefined, omitBy } from "es-toolkit";
import { FunHalfFeedEnvs } from "../fun-half-feed.types.js";
import type { FunHalfConfig, WallClockTime } from "./fun-half.types.js";

export const DEFAULT_TIME_ZONE = "America/Detroit";
export const DEFAULT_CHANNEL_HANDLE = "@samSeder";
export const DEFAULT_OUTPUT_PATH = "public/funhalf.xml";
export const DEFAULT_FEED_URL = "https://example.github.io/fun-half-feed/funhalf.xml";
export const DEFAULT_CUTOFF = "12:25";
export const DEFAULT_MAX_COMMENTS = 50;
export const DEFAULT_YT_DLP_PATH = "yt-dlp";

const FEED_TITLE = "Majority Report – Fun Half";
const FEED_DESCRIPTION = "Daily Fun Half links from MR Live";

export const ALLOWED_LINK_PREFIXES = ["https://www.youtube.com/live/", "https://youtube.com/live/", "https://youtu.be/"] as const;

const CUTOFF_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

const timeZoneSchema = z.string().refine(isValidTimeZone, (value) => ({ message: `Unknown time zone: ${value}` }));

const configInputSchema = z.object({
  timeZone: timeZoneSchema.default(DEFAULT_TIME_ZONE),
  channelHandle: z
    .string()
    .regex(/^@[\w.-]+$/, "Channel handle must look like @name")
    .default(DEFAULT_CHANNEL_HANDLE),
  outputPath: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
  feedUrl: z.string().url().default(DEFAULT_FEED_URL),
  cutoff: z.string().regex(CUTOFF_PATTERN, "Cutoff must be HH:MM").default(DEFAULT_CUTOFF),
  ytDlpPath: z.string().min(1).default(DEFAULT_YT_DLP_PATH),
  debug: z.boolean().default(false),
});

export type FunHalfConfigOverrides = Partial<z.input<typeof configInputSchema>>;

/**
 * Builds the immutable run configuration from environment variables, with explicit overrides taking precedence.
 * Throws on invalid values.
 */
export function loadFunHalfConfig(env: NodeJS.ProcessEnv = process.env, overrides: FunHalfConfigOverrides = {}): Readonly<FunHalfConfig> {
  const fromEnv: FunHalfConfigOverrides = {
    timeZone: env[FunHalfFeedEnvs.FUN_HALF_TIME_ZONE] || undefined,
    channelHandle: env[FunHalfFeedEnvs.FUN_HALF_CHANNEL_HANDLE] || undefined,
    outputPath: env[FunHalfFeedEnvs.FUN_HALF_OUTPUT_PATH] || undefined,
    feedUrl: env[FunHalfFeedEnvs.FUN_HALF_FEED_URL] || undefined,
    cutoff: env[FunHalfFeedEnvs.FUN_HALF_CUTOFF] || undefined,
    ytDlpPath: env[FunHalfFeedEnvs.FUN_HALF_YT_DLP_PATH] || undefined,
    debug: env[FunHalfFeedEnvs.FUN_HALF_DEBUG] ? env[FunHalfFeedEnvs.FUN_HALF_DEBUG] === "true" : undefined,
  };

  const result = configInputSchema.safeParse({ ...omitBy(fromEnv, isUndefined), ...omitBy(overrides, isUndefined) });
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const input = result.data;
  return Object.freeze({
    timeZone: input.timeZone,
    channelHandle: input.channelHandle,
    liveTabUrl: `https://www.youtube.com/${input.channelHandle}/videos?view=2&live_view=502&sort=dd`,
    outputPath: input.outputPath,
    feed: Object.freeze({
      title: FEED_TITLE,
      link: `https://www.youtube.com/${input.channelHandle}`,
      description: FEED_DESCRIPTION,
      selfUrl: input.feedUrl,
    }),
    allowedPrefixes: ALLOWED_LINK_PREFIXES,
    cutoff: Object.freeze(parseCutoff(input.cutoff)),
    maxComments: DEFAULT_MAX_COMMENTS,
    ytDlpPath: input.ytDlpPath,
    debug: input.debug,
  });
}

export function parseCutoff(value: string): WallClockTime {
  const match = value.match(CUTOFF_PATTERN);
  if (!match) {
    throw new Error(`Invalid cutoff time: ${value}`);
  }

  return { hour: parseInt(match[1], 10), minute: parseInt(match[2], 10) };
}

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}
