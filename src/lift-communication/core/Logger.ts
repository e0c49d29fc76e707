/* eslint-disable no-console */

export interface ILogger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export const consoleLogger: ILogger = {
  debug: (message, ...details) => console.debug(message, ...details),
  info: (message, ...details) => console.log(message, ...details),
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
};

// Rate limits a repeating condition to one log line per interval.
export class ThrottledLog {
  private lastLoggedAt = Number.NEGATIVE_INFINITY;

  constructor(private readonly intervalMs: number) {}

  public shouldLog(now: number): boolean {
    if (now - this.lastLoggedAt < this.intervalMs) {
      return false;
    }
    this.lastLoggedAt = now;
    return true;
  }

  public reset(): void {
    this.lastLoggedAt = Number.NEGATIVE_INFINITY;
  }
}
