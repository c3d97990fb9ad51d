/** ISO calendar date, `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface ZonedDateTime {
  date: CalendarDate;
  hour: number;
  minute: number;
  second: number;
}

export interface WallClockTime {
  hour: number;
  minute: number;
}

export interface CandidateEntry {
  id?: string;
  url?: string;
  title: string;
  durationSeconds: number;
  uploadDate?: CalendarDate;
}

export interface SelectedStream {
  id?: string;
  url?: string;
  title: string;
  matchedDate: CalendarDate;
}

export interface VideoComment {
  text: string;
  pinned: boolean;
}

export interface VideoMetadata {
  description: string;
  comments: VideoComment[];
}

export interface FeedChannel {
  title: string;
  link: string;
  description: string;
  selfUrl: string;
}

export interface FeedItem {
  title: string;
  // also the item guid
  link: string;
  publishedAt: Date;
}

export interface FunHalfConfig {
  timeZone: string;
  channelHandle: string;
  liveTabUrl: string;
  outputPath: string;
  feed: Readonly<FeedChannel>;
  allowedPrefixes: readonly string[];
  cutoff: Readonly<WallClockTime>;
  maxComments: number;
  ytDlpPath: string;
  debug: boolean;
}
