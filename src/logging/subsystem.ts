import { getChildLogger } from "./logger.js";

export type SubsystemLogger = {
  subsystem: string;
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  child: (name: string) => SubsystemLogger;
};

/**
 * Logger scoped to one part of the server, e.g. `chatgate/listener`.
 * The tslog instance is resolved lazily so `setLoggerOverride` applies to
 * loggers created before it was called.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const resolve = () => getChildLogger(subsystem);
  return {
    subsystem,
    debug: (...args) => {
      resolve().debug(...args);
    },
    info: (...args) => {
      resolve().info(...args);
    },
    warn: (...args) => {
      resolve().warn(...args);
    },
    error: (...args) => {
      resolve().error(...args);
    },
    child: (name) => createSubsystemLogger(`${subsystem}/${name}`),
  };
}
