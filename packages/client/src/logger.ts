import type { LogLevel } from "@crawlbridge/schemas";

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export type LoggerFactory = (scope: string) => Logger;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export class ConsoleLogger implements Logger {
  private prefix: string;
  private minRank: number;

  constructor(scope: string, readonly level: LogLevel = "info") {
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safeScope}]`;
    this.minRank = LEVEL_RANK[level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.minRank > LEVEL_RANK.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.minRank > LEVEL_RANK.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.minRank > LEVEL_RANK.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }
}

export function consoleLoggerFactory(level: LogLevel = "info"): LoggerFactory {
  return (scope) => new ConsoleLogger(scope, level);
}
