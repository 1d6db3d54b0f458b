import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

type ConsoleMethod = "log" | "info" | "warn" | "error";

/**
 * Mirrors console output into an append-only log file. The bridge logs
 * through console.error, so everything it reports reaches the file while
 * stdout stays reserved for responses.
 */
export function initializeLogging(logFile?: string): LoggingHandle {
  if (!logFile) {
    return {
      shutdown: () => undefined,
    };
  }

  const resolvedLog = path.resolve(logFile);
  const logDir = path.dirname(resolvedLog);
  if (!existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }

  const stream = createWriteStream(resolvedLog, { flags: "a" });
  const startedAt = new Date().toISOString();
  stream.write(`[${startedAt}] --- bridge session started (pid ${process.pid}) ---\n`);

  const original: Record<ConsoleMethod, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  };

  stream.on("error", (err) => {
    original.error(`Log file ${resolvedLog} became unwritable:`, err.message);
  });

  const mirror =
    (method: ConsoleMethod) =>
    (...args: unknown[]) => {
      original[method](...args);
      if (stream.destroyed || stream.writableEnded) return;
      const timestamp = new Date().toISOString();
      stream.write(`[${timestamp}] ${args.map(formatArg).join(" ")}\n`);
    };

  console.log = mirror("log");
  console.info = mirror("info");
  console.warn = mirror("warn");
  console.error = mirror("error");

  let closed = false;
  const shutdown = () => {
    if (closed) return;
    closed = true;
    console.log = original.log;
    console.info = original.info;
    console.warn = original.warn;
    console.error = original.error;
    const endedAt = new Date().toISOString();
    stream.end(`[${endedAt}] --- bridge session ended ---\n`);
  };

  return {
    logPath: resolvedLog,
    shutdown,
  };
}

function formatArg(arg: unknown): string {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}
