/**
 * Logging and observability utilities.
 */

export { generateRunId, initRunId, getRunId, type RunIdOptions } from "./run-id.js";
export {
  createLogger,
  formatLogLine,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
  type LogLine,
  type LogScope,
} from "./logger.js";
export {
  EventLog,
  EventKind,
  EventLogError,
  formatEventEntry,
  parseEventEntry,
  prettyEventEntry,
  type EventEntry,
  type EventLogConfig,
  type EventPayload,
  type EventQuery,
} from "./event-log.js";
