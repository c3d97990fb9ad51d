import { promises as fs } from "fs";
import { dirname, normalize } from "path";
import type { ILogger } from "../common/logger.types.js";
import {
  createEmptyFeedDocument,
  FeedDocumentParseError,
  getItemIdentifiers,
  parseFeedDocument,
  prependItem,
  type RawFeedDocument,
  serializeFeedDocument,
} from "./feed-document.js";
import type { FeedChannel } from "./fun-half.types.js";
import type { FeedStore } from "./feed-store.types.js";

/**
 * RSS feed kept in a single file.
 *
 * Writes go to a temporary file that is renamed over the feed, so readers never see a partial document.
 * The read-modify-write in `append` takes no lock: two processes appending to the same file at once can
 * lose an item. Runs are expected to be scheduled one at a time.
 */
export class FileFeedStore implements FeedStore {
  constructor(private readonly logger: ILogger, private readonly channel: FeedChannel, private readonly timeZone: string) {}

  public async ensureExists(path: string): Promise<void> {
    const filePath = normalize(path);
    if (await this.fileExists(filePath)) {
      return;
    }

    await this.writeToDisk(filePath, createEmptyFeedDocument(this.channel));
    this.logger.info(`Created empty feed at ${filePath}`);
  }

  public async readIdentifiers(path: string): Promise<Set<string>> {
    const filePath = normalize(path);
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return new Set();
      }

      this.logger.error(`Failed to read feed ${filePath}`, error);
      throw error;
    }

    try {
      return new Set(getItemIdentifiers(parseFeedDocument(content)));
    } catch (error) {
      if (!(error instanceof FeedDocumentParseError)) {
        throw error;
      }

      await this.recoverCorruptFile(filePath, error);
      return new Set();
    }
  }

  public async append(path: string, title: string, link: string, publishedAt: Date): Promise<boolean> {
    const filePath = normalize(path);
    await this.ensureExists(filePath);

    const identifiers = await this.readIdentifiers(filePath);
    if (identifiers.has(link)) {
      this.logger.info(`Feed already has ${link}, nothing to add`);
      return false;
    }

    const document = parseFeedDocument(await fs.readFile(filePath, "utf-8"));
    await this.writeToDisk(filePath, prependItem(document, { title, link, publishedAt }, this.timeZone));

    this.logger.info(`Added "${title}" (${link}) to ${filePath}`);
    return true;
  }

  private async recoverCorruptFile(filePath: string, parseError: FeedDocumentParseError): Promise<void> {
    const backupPath = await this.nextBackupPath(filePath);
    await fs.rename(filePath, backupPath);
    this.logger.warn(`Feed ${filePath} is unreadable (${parseError.message}), moved it to ${backupPath}`);

    await this.ensureExists(filePath);
  }

  // <path>.bak-<unix seconds>, with a counter when that second already has a backup
  private async nextBackupPath(filePath: string): Promise<string> {
    const basePath = `${filePath}.bak-${Math.floor(Date.now() / 1000)}`;
    let backupPath = basePath;
    for (let counter = 1; await this.fileExists(backupPath); counter++) {
      backupPath = `${basePath}-${counter}`;
    }

    return backupPath;
  }

  private async writeToDisk(filePath: string, document: RawFeedDocument): Promise<void> {
    const tempFilePath = `${filePath}.tmp`;
    try {
      await fs.mkdir(dirname(filePath), { recursive: true });

      const handle = await fs.open(tempFilePath, "w");
      try {
        await handle.writeFile(serializeFeedDocument(document), "utf-8");
        await handle.sync();
      } finally {
        await handle.close();
      }

      await fs.rename(tempFilePath, filePath);
      this.logger.debug(`Wrote feed to ${filePath}`);
    } catch (error) {
      this.logger.error(`Failed to write feed ${filePath}`, error);
      await fs.rm(tempFilePath, { force: true });
      throw error;
    }
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return false;
      }

      throw error;
    }
  }
}
