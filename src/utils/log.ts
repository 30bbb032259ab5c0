export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const order: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 50 };

function isLogLevel(value: string): value is LogLevel {
  return value in order;
}

let threshold: LogLevel = resolveLevel(process.env.LOG_LEVEL);

function resolveLevel(value: string | undefined): LogLevel {
  const lower = (value ?? "info").toLowerCase();
  return isLogLevel(lower) ? lower : "info";
}

export function setLogLevel(level: string | undefined): void {
  threshold = resolveLevel(level);
}

function shouldLog(level: LogLevel): boolean {
  return order[level] >= order[threshold];
}

function format(level: LogLevel, msg: string, source?: string): string {
  const time = new Date().toISOString();
  return `[${time}]${source ? ` [${source}]` : ""} ${level.toUpperCase()}: ${msg}`;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export function createLogger(source?: string): Logger {
  return {
    debug: (msg) => {
      if (shouldLog("debug")) console.debug(format("debug", msg, source));
    },
    info: (msg) => {
      if (shouldLog("info")) console.info(format("info", msg, source));
    },
    warn: (msg) => {
      if (shouldLog("warn")) console.warn(format("warn", msg, source));
    },
    error: (msg) => {
      if (shouldLog("error")) console.error(format("error", msg, source));
    }
  };
}
