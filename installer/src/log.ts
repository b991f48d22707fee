export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger with a different bracketed prefix, same sink. */
  scope(name: string): Logger;
}

export function createConsoleLogger(
  scope = "installer",
  debugEnabled = !!process.env.SBX_DEBUG
): Logger {
  return {
    debug(message) {
      if (debugEnabled) console.log(`[${scope}] (debug) ${message}`);
    },
    info(message) {
      console.log(`[${scope}] ${message}`);
    },
    warn(message) {
      console.warn(`[${scope}] Warning: ${message}`);
    },
    error(message) {
      console.error(`[${scope}] Error: ${message}`);
    },
    scope(name) {
      return createConsoleLogger(name, debugEnabled);
    },
  };
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
}

export interface MemoryLogger extends Logger {
  readonly entries: LogEntry[];
  messages(level: LogLevel): string[];
}

/** Collects entries instead of printing them; shared by every scope it hands out. */
export function createMemoryLogger(scope = "installer", entries: LogEntry[] = []): MemoryLogger {
  const push = (level: LogLevel) => (message: string) => {
    entries.push({ level, scope, message });
  };
  return {
    entries,
    debug: push("debug"),
    info: push("info"),
    warn: push("warn"),
    error: push("error"),
    scope(name) {
      return createMemoryLogger(name, entries);
    },
    messages(level) {
      return entries.filter((e) => e.level === level).map((e) => e.message);
    },
  };
}
