import { spawn } from "child_process";
import { z } from "zod";
import type { ILogger } from "../common/logger.types.js";
import { fromEpochSeconds, fromUploadDate } from "./business-date.js";
import { ProviderError } from "./errors.js";
import type { CandidateEntry, FunHalfConfig, VideoComment, VideoMetadata } from "./fun-half.types.js";
import type { VideoProvider } from "./video-provider.types.js";

const COMMAND_TIMEOUT_MS = 5 * 60 * 1000;
const MAX_STDERR_IN_ERROR = 500;

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (executable: string, args: string[]) => Promise<CommandResult>;

const rawEntrySchema = z.object({
  id: z.string().nullish(),
  url: z.string().nullish(),
  webpage_url: z.string().nullish(),
  title: z.string().nullish(),
  duration: z.number().nullish(),
  upload_date: z.string().nullish(),
  timestamp: z.number().nullish(),
  release_timestamp: z.number().nullish(),
});

const playlistSchema = z.object({
  entries: z.array(rawEntrySchema.nullable()).nullish(),
});

const videoSchema = z.object({
  description: z.string().nullish(),
  comments: z
    .array(
      z.object({
        text: z.string().nullish(),
        is_pinned: z.boolean().nullish(),
        pinned: z.boolean().nullish(),
      })
    )
    .nullish(),
});

function spawnCommand(executable: string, args: string[]): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(executable, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    const timeoutId = setTimeout(() => child.kill(), COMMAND_TIMEOUT_MS);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", (error) => {
      clearTimeout(timeoutId);
      reject(error);
    });
    child.on("close", (exitCode) => {
      clearTimeout(timeoutId);
      resolve({
        exitCode,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });
}

export type RawEntry = z.infer<typeof rawEntrySchema>;

export type YtDlpProviderConfig = Pick<FunHalfConfig, "ytDlpPath" | "liveTabUrl" | "timeZone" | "maxComments">;

/**
 * Lists the channel's live videos and reads video metadata through the `yt-dlp` executable.
 */
export class YtDlpVideoProvider implements VideoProvider {
  constructor(
    private readonly logger: ILogger,
    private readonly config: YtDlpProviderConfig,
    private readonly runCommand: CommandRunner = spawnCommand
  ) {}

  public async listCandidates(): Promise<CandidateEntry[]> {
    const args = ["--flat-playlist", "--dump-single-json", "--skip-download", "--no-check-certificates", "--quiet", this.config.liveTabUrl];
    const playlist = await this.runJson(args, playlistSchema, `list videos from ${this.config.liveTabUrl}`);
    const entries = (playlist.entries || []).filter((entry): entry is RawEntry => entry !== null);

    this.logger.debug(`Listed ${entries.length} live entries`);
    return entries.map((entry) => toCandidateEntry(entry, this.config.timeZone));
  }

  public async fetchVideoMetadata(videoUrl: string): Promise<VideoMetadata> {
    const args = [
      "--dump-single-json",
      "--skip-download",
      "--no-check-certificates",
      "--quiet",
      "--get-comments",
      "--extractor-args",
      `youtube:max_comments=${this.config.maxComments};player_client=android`,
      videoUrl,
    ];
    const video = await this.runJson(args, videoSchema, `fetch metadata for ${videoUrl}`);

    const comments: VideoComment[] = (video.comments || []).map((comment) => ({
      text: comment.text || "",
      pinned: Boolean(comment.is_pinned ?? comment.pinned),
    }));

    return {
      description: video.description || "",
      comments,
    };
  }

  private async runJson<T>(args: string[], schema: z.ZodType<T, z.ZodTypeDef, unknown>, action: string): Promise<T> {
    let result: CommandResult;
    try {
      result = await this.runCommand(this.config.ytDlpPath, args);
    } catch (error) {
      throw new ProviderError(`Failed to ${action}: ${error instanceof Error ? error.message : "Unknown error"}`, { cause: error });
    }

    if (result.exitCode !== 0) {
      const stderr = result.stderr.trim().slice(0, MAX_STDERR_IN_ERROR);
      throw new ProviderError(`Failed to ${action}: yt-dlp exited with code ${result.exitCode}${stderr ? `: ${stderr}` : ""}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch (error) {
      throw new ProviderError(`Failed to ${action}: yt-dlp output is not JSON`, { cause: error });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderError(`Failed to ${action}: unexpected yt-dlp output (${parsed.error.issues[0]?.message})`, { cause: parsed.error });
    }

    return parsed.data;
  }
}

export function toCandidateEntry(entry: RawEntry, timeZone: string): CandidateEntry {
  return {
    id: entry.id || undefined,
    url: entry.url || entry.webpage_url || undefined,
    title: entry.title || "",
    durationSeconds: Math.max(0, Math.round(entry.duration || 0)),
    uploadDate: resolveUploadDate(entry, timeZone),
  };
}

function resolveUploadDate(entry: RawEntry, timeZone: string): string | undefined {
  const timestamp = entry.release_timestamp ?? entry.timestamp;
  if (timestamp !== null && timestamp !== undefined) {
    return fromEpochSeconds(timestamp, timeZone);
  }

  return entry.upload_date ? fromUploadDate(entry.upload_date, timeZone) : undefined;
}
