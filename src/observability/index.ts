/**
 * @fileoverview Observability module public exports.
 *
 * @module taskpilot/observability
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';
