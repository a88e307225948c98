import { appendFileSync } from "node:fs";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export interface LoggerOptions {
  /** Console threshold */
  level?: LogLevel;
  /** Appended to, uncolored, for every record at `fileLevel` or above */
  logfile?: string;
  fileLevel?: LogLevel;
  /** Defaults to `() => new Date()` */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Multi-line record; blank lines are dropped */
  record(level: LogLevel, lines: string[]): void;
}

/**
 * Map the number of `-v` flags to a console level
 */
export function levelForVerbosity(verbosity: number): LogLevel {
  if (verbosity >= 2) return "debug";
  if (verbosity === 1) return "info";
  return "error";
}

function formatData(data: unknown): string {
  if (data === undefined) return "";
  if (typeof data === "object") {
    return ` ${JSON.stringify(data, null, 2)}`;
  }
  return ` ${String(data)}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const consoleLevel: LogLevel = options.level ?? "info";
  const fileLevel: LogLevel = options.fileLevel ?? "info";
  const now = options.now ?? (() => new Date());

  function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[threshold];
  }

  function emit(level: LogLevel, lines: string[]): void {
    const toConsole = shouldLog(level, consoleLevel);
    const toFile = options.logfile !== undefined && shouldLog(level, fileLevel);
    if (!toConsole && !toFile) return;

    const timestamp = now().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    if (toConsole) {
      const color = LEVEL_COLORS[level];
      const text = lines.map((line) => `${color}[${timestamp}] ${levelStr}${RESET} ${line}`).join("\n");
      if (level === "error") console.error(text);
      else if (level === "warn") console.warn(text);
      else console.log(text);
    }

    if (toFile && options.logfile) {
      const text = lines.map((line) => `[${timestamp}] ${levelStr} ${line}\n`).join("");
      appendFileSync(options.logfile, text);
    }
  }

  return {
    debug: (message, data) => emit("debug", [message + formatData(data)]),
    info: (message, data) => emit("info", [message + formatData(data)]),
    warn: (message, data) => emit("warn", [message + formatData(data)]),
    error: (message, data) => emit("error", [message + formatData(data)]),
    record(level, lines) {
      const kept = lines.filter((line) => /\S/.test(line));
      if (kept.length > 0) emit(level, kept);
    },
  };
}
