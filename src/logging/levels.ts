export const LOG_LEVELS = ["silent", "fatal", "error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

// tslog numbers its levels from 0 (silly) to 6 (fatal).
const TSLOG_MIN_LEVEL: Record<Exclude<LogLevel, "silent">, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export function normalizeLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const candidate = value?.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

export function toTslogMinLevel(level: Exclude<LogLevel, "silent">): number {
  return TSLOG_MIN_LEVEL[level];
}
