export interface FeedStore {
  /**
   * Creates a metadata-only feed at `path` unless a file is already there.
   */
  ensureExists(path: string): Promise<void>;

  /**
   * Identifiers of the items in the feed. An unreadable feed is backed up and replaced with an empty one.
   */
  readIdentifiers(path: string): Promise<Set<string>>;

  /**
   * Adds an item before all existing ones. Returns false, without writing, when the link is already present.
   */
  append(path: string, title: string, link: string, publishedAt: Date): Promise<boolean>;
}
