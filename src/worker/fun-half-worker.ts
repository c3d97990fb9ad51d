import type { ILogger } from "../common/logger.types.js";
import { isBeforeCutoff, previousBusinessDate, resolveTargetDate, toZonedDateTime } from "../fun-half/business-date.js";
import type { FeedStore } from "../fun-half/feed-store.types.js";
import type { CalendarDate, CandidateEntry, FunHalfConfig } from "../fun-half/fun-half.types.js";
import { extractLink } from "../fun-half/link-extractor.js";
import { resolveVideoUrl, selectStream } from "../fun-half/stream-selector.js";
import type { VideoProvider } from "../fun-half/video-provider.types.js";

export type RunOutcome =
  | { status: "appended"; title: string; link: string; targetDate: CalendarDate }
  | { status: "duplicate"; title: string; link: string; targetDate: CalendarDate }
  | { status: "no-stream"; targetDate: CalendarDate }
  | { status: "too-early"; targetDate: CalendarDate }
  | { status: "no-link"; targetDate: CalendarDate };

export interface FunHalfWorkerOptions {
  config: Readonly<FunHalfConfig>;
  provider: VideoProvider;
  store: FeedStore;
  logger: ILogger;
  now?: Date;
}

export const funHalfTitle = (date: CalendarDate) => `Fun Half – ${date}`;

export const previousWeekdayTitle = (date: CalendarDate) => `Fun Half – ${date} (from previous weekday’s live)`;

/**
 * Runs the pipeline once: pick the day's livestream, find its Fun Half link and add it to the feed.
 * Finding nothing is a normal outcome; only provider failures are thrown.
 */
export const runFunHalfWorker = async (options: FunHalfWorkerOptions): Promise<RunOutcome> => {
  const { config, provider, store, logger } = options;
  const now = options.now || new Date();

  const today = toZonedDateTime(now, config.timeZone);
  const targetDate = resolveTargetDate(today.date);
  logger.info(`Target date ${targetDate} (local time ${today.date} ${pad(today.hour)}:${pad(today.minute)} ${config.timeZone})`);

  // the feed file must exist even when there is nothing to add
  await store.ensureExists(config.outputPath);

  const candidates = await provider.listCandidates();
  logger.info(`Listed ${candidates.length} candidate videos`);

  const stream = selectStream(candidates, targetDate);
  if (!stream) {
    logger.info(`No livestream found for ${targetDate}`);
    return { status: "no-stream", targetDate };
  }

  logger.info(`Selected "${stream.title}" for ${targetDate}`);
  const link = await findLink(options, resolveVideoUrl(stream));
  if (link) {
    return appendItem(options, funHalfTitle(targetDate), link, now, targetDate);
  }

  if (isBeforeCutoff(today, config.cutoff)) {
    logger.info(`No Fun Half link yet and it is before ${pad(config.cutoff.hour)}:${pad(config.cutoff.minute)}, a later run will retry`);
    return { status: "too-early", targetDate };
  }

  return fallBackToPreviousWeekday(options, candidates, targetDate, now);
};

const fallBackToPreviousWeekday = async (
  options: FunHalfWorkerOptions,
  candidates: CandidateEntry[],
  targetDate: CalendarDate,
  now: Date
): Promise<RunOutcome> => {
  const { logger } = options;
  const previousDate = previousBusinessDate(targetDate);
  logger.info(`No Fun Half link for ${targetDate}, trying the livestream of ${previousDate}`);

  // TODO: re-list candidates when the previous weekday's stream is no longer in the first page of results
  const previousStream = selectStream(candidates, previousDate);
  if (!previousStream) {
    logger.info(`No livestream found for ${previousDate}`);
    return { status: "no-link", targetDate };
  }

  const link = await findLink(options, resolveVideoUrl(previousStream));
  if (!link) {
    return { status: "no-link", targetDate };
  }

  return appendItem(options, previousWeekdayTitle(previousDate), link, now, targetDate);
};

const findLink = async (options: FunHalfWorkerOptions, videoUrl: string | undefined): Promise<string | undefined> => {
  if (!videoUrl) {
    options.logger.warn("Selected livestream has neither a URL nor an id");
    return undefined;
  }

  return extractLink(options.provider, videoUrl, options.config, options.logger);
};

const appendItem = async (
  options: FunHalfWorkerOptions,
  title: string,
  link: string,
  publishedAt: Date,
  targetDate: CalendarDate
): Promise<RunOutcome> => {
  const inserted = await options.store.append(options.config.outputPath, title, link, publishedAt);
  return { status: inserted ? "appended" : "duplicate", title, link, targetDate };
};

const pad = (value: number) => value.toString().padStart(2, "0");
