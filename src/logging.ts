export { isLogLevel, normalizeLogLevel, type LogLevel } from "./logging/levels.js";
export {
  getChildLogger,
  getLogger,
  getResolvedLoggerSettings,
  resetLogger,
  setLoggerOverride,
  type LoggerResolvedSettings,
  type LoggerSettings,
} from "./logging/logger.js";
export { createSubsystemLogger, type SubsystemLogger } from "./logging/subsystem.js";
