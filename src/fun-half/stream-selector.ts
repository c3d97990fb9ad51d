import { maxBy, orderBy } from "es-toolkit";
import type { CalendarDate, CandidateEntry, SelectedStream } from "./fun-half.types.js";

// never the main daily show
const EXCLUDED_TITLE_TERMS = ["clip", "members", "premiere"];

const WATCH_URL_PREFIX = "https://www.youtube.com/watch?v=";

/**
 * Picks the daily livestream for `targetDate`.
 *
 * The longest eligible video uploaded on the target date wins. Without one, the most recent eligible video
 * uploaded before it is used, preferring the longer one among videos from the same date.
 */
export function selectStream(candidates: readonly CandidateEntry[], targetDate: CalendarDate): SelectedStream | undefined {
  const eligible = candidates.filter((candidate) => !isExcludedTitle(candidate.title));

  const sameDay = eligible.filter((candidate) => candidate.uploadDate === targetDate);
  const longest = maxBy(sameDay, (candidate) => candidate.durationSeconds);
  if (longest) {
    return toSelectedStream(longest, targetDate);
  }

  const prior = eligible.filter((candidate) => candidate.uploadDate !== undefined && candidate.uploadDate <= targetDate);
  const [latest] = orderBy(prior, [(candidate) => candidate.uploadDate, (candidate) => candidate.durationSeconds], ["desc", "desc"]);
  return latest ? toSelectedStream(latest, targetDate) : undefined;
}

export function isExcludedTitle(title: string): boolean {
  const lowered = title.toLowerCase();
  return EXCLUDED_TITLE_TERMS.some((term) => lowered.includes(term));
}

/**
 * The page URL of a selected stream, built from its id when the listing carried no URL.
 */
export function resolveVideoUrl(stream: Pick<SelectedStream, "id" | "url">): string | undefined {
  if (stream.url) {
    return stream.url;
  }

  return stream.id ? `${WATCH_URL_PREFIX}${stream.id}` : undefined;
}

function toSelectedStream(candidate: CandidateEntry, matchedDate: CalendarDate): SelectedStream {
  return {
    id: candidate.id,
    url: candidate.url,
    title: candidate.title,
    matchedDate,
  };
}
