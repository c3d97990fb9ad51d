/**
 * Raised when the video platform could not be listed or a video's metadata could not be fetched.
 * Fatal to the current run; the next scheduled run is the retry.
 */
export class ProviderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderError";
  }
}
