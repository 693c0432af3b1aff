/**
 * Telemetry
 *
 * Structured logging and OpenTelemetry spans.
 */

export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  createRequestLogger,
  type LogLevel,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export { isOTELEnabled, getOTELTracer, withSpanSync } from './otel.ts';
