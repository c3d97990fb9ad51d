import type { ILogger } from "./logger.types.js";

export class ConsoleLogger implements ILogger {
  constructor(private readonly name: string, private readonly isDebug: boolean = false) {}

  public debug(message: string, error?: unknown): void {
    if (!this.isDebug) {
      return;
    }

    console.debug(this.format("DEBUG", message), ...this.details(error));
  }

  public info(message: string, error?: unknown): void {
    console.log(this.format("INFO", message), ...this.details(error));
  }

  public warn(message: string, error?: unknown): void {
    console.warn(this.format("WARN", message), ...this.details(error));
  }

  public error(message: string, error?: unknown): void {
    console.error(this.format("ERROR", message), ...this.details(error));
  }

  private format(level: string, message: string): string {
    return `${new Date().toISOString()} ${level} [${this.name}] ${message}`;
  }

  private details(error: unknown): unknown[] {
    return error === undefined ? [] : [error];
  }
}
