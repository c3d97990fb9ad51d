import type { CandidateEntry, VideoMetadata } from "./fun-half.types.js";

export interface VideoProvider {
  /**
   * Recent live videos of the channel, newest first.
   */
  listCandidates(): Promise<CandidateEntry[]>;

  fetchVideoMetadata(videoUrl: string): Promise<VideoMetadata>;
}
