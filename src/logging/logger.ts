import { Logger as TsLogger, type ILogObj } from "tslog";

import { normalizeLogLevel, toTslogMinLevel, type LogLevel } from "./levels.js";

export type LoggerSettings = {
  level?: LogLevel;
  /** "pretty" for terminals, "json" for log shippers. */
  style?: "pretty" | "json";
};

export type LoggerResolvedSettings = Required<LoggerSettings>;

let rootLogger: TsLogger<ILogObj> | null = null;
let overrideSettings: LoggerSettings | null = null;
const childLoggers = new Map<string, TsLogger<ILogObj>>();

export function getResolvedLoggerSettings(): LoggerResolvedSettings {
  const level = overrideSettings?.level ?? normalizeLogLevel(process.env.CHATGATE_LOG_LEVEL);
  const style =
    overrideSettings?.style ?? (process.env.CHATGATE_LOG_STYLE === "json" ? "json" : "pretty");
  return { level, style };
}

export function getLogger(): TsLogger<ILogObj> {
  if (!rootLogger) {
    const settings = getResolvedLoggerSettings();
    rootLogger = new TsLogger<ILogObj>({
      name: "chatgate",
      type: settings.level === "silent" ? "hidden" : settings.style,
      minLevel: settings.level === "silent" ? 0 : toTslogMinLevel(settings.level),
    });
  }
  return rootLogger;
}

export function getChildLogger(name: string): TsLogger<ILogObj> {
  const existing = childLoggers.get(name);
  if (existing) {
    return existing;
  }
  const child = getLogger().getSubLogger({ name });
  childLoggers.set(name, child);
  return child;
}

/** Replaces the settings used by the next `getLogger()` call. */
export function setLoggerOverride(settings: LoggerSettings | null): void {
  overrideSettings = settings;
  rootLogger = null;
  childLoggers.clear();
}

export function resetLogger(): void {
  setLoggerOverride(null);
}
