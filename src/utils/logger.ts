export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface Logger {
  level: LogLevel;
  debug(msg: string, meta?: unknown): void;
  info(msg: string, meta?: unknown): void;
  warn(msg: string, meta?: unknown): void;
  error(msg: string, meta?: unknown): void;
}

/** Where log lines go; `console` satisfies it. */
export interface LogOutput {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

const LEVEL_NUM: Record<LogLevel, number> = { silent: 0, error: 1, warn: 2, info: 3, debug: 4 };

const formatMeta = (meta: unknown) => {
  if (meta === undefined) return "";
  try {
    return " " + JSON.stringify(meta);
  } catch {
    return " [meta:unstringifiable]";
  }
};

export function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_NUM, v);
}

export function createLogger(level: LogLevel, out: LogOutput = console): Logger {
  const threshold = LEVEL_NUM[level];
  const should = (l: LogLevel) => LEVEL_NUM[l] <= threshold;

  return {
    level,
    debug: (msg, meta) => {
      if (should("debug")) out.log(`[pokegate][debug] ${msg}${formatMeta(meta)}`);
    },
    info: (msg, meta) => {
      if (should("info")) out.log(`[pokegate] ${msg}${formatMeta(meta)}`);
    },
    warn: (msg, meta) => {
      if (should("warn")) out.warn(`[pokegate][warn] ${msg}${formatMeta(meta)}`);
    },
    error: (msg, meta) => {
      if (should("error")) out.error(`[pokegate][error] ${msg}${formatMeta(meta)}`);
    },
  };
}

export function envLogLevel(env: Record<string, string | undefined>): LogLevel {
  const v = (env.POKEGATE_LOG_LEVEL || env.LOG_LEVEL || "").toLowerCase();
  return isLogLevel(v) ? v : "info";
}

/** Logger that drops everything; handy default for library callers and tests. */
export const silentLogger: Logger = createLogger("silent");
