import type { LoggerPort, LogLevel } from "../../ports/sys/LoggerPort";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
}

/**
 * Logger for a process whose stdout carries protocol traffic: every level is
 * written through console.error so it lands on stderr (and in the mirrored
 * log file when one is configured).
 */
export class ConsoleLogger implements LoggerPort {
  private readonly level: LogLevel;
  private readonly scope?: string;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.scope = options.scope;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }
  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }
  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }
  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const prefix = this.scope ? `${level.toUpperCase()} [${this.scope}]` : level.toUpperCase();
    const payload =
      meta && Object.keys(meta).length ? `${prefix} ${message} ${safeStringify(meta)}` : `${prefix} ${message}`;
    console.error(payload);
  }
}

function safeStringify(meta: Record<string, unknown>): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return String(meta);
  }
}
