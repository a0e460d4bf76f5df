import { createWriteStream, existsSync, mkdirSync } from "fs";
import path from "path";

export interface LoggingHandle {
  readonly logPath?: string;
  shutdown(): void;
}

type ConsoleLevel = "log" | "info" | "warn" | "error" | "debug";

const LEVELS: readonly ConsoleLevel[] = ["log", "info", "warn", "error", "debug"];

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
  stream.write(`[${startedAt}] --- Interval clock session started ---\n`);

  const original: Record<ConsoleLevel, (...args: unknown[]) => void> = {
    log: console.log.bind(console),
    info: console.info.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
    debug: console.debug.bind(console),
  };

  const mirror = (level: ConsoleLevel) =>
    (...args: unknown[]) => {
      original[level](...args);
      try {
        const timestamp = new Date().toISOString();
        const message = args.map(formatArg).join(" ");
        stream.write(`[${timestamp}] ${level.toUpperCase()} ${message}\n`);
      } catch (err) {
        original.error("Failed to write log file entry:", err);
      }
    };

  for (const level of LEVELS) {
    console[level] = mirror(level);
  }

  let closed = false;
  const shutdown = () => {
    if (closed) return;
    closed = true;
    for (const level of LEVELS) {
      console[level] = original[level];
    }
    const endedAt = new Date().toISOString();
    stream.write(`[${endedAt}] --- Interval clock session ended ---\n`);
    stream.end();
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
    return JSON.stringify(arg) ?? String(arg);
  } catch {
    return String(arg);
  }
}
