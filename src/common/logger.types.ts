export interface ILogger {
  debug(message: string, error?: unknown): void;

  info(message: string, error?: unknown): void;

  warn(message: string, error?: unknown): void;

  error(message: string, error?: unknown): void;
}
