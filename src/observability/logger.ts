/**
 * @fileoverview Structured Logger - leveled logging for taskpilot.
 *
 * The logger provides structured, leveled logging with support for:
 * - Contextual metadata
 * - Run IDs tying entries to one agent run
 * - Multiple output transports
 *
 * All log entries are JSON-serializable. The console transport writes to
 * stderr so that stdout stays free for command output.
 *
 * @module taskpilot/observability/logger
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** Unique ID for this log entry */
  readonly id: UniqueId;

  readonly timestamp: Timestamp;

  readonly level: Severity;

  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Run ID if logged during a run */
  readonly runId: UniqueId | null;

  /** Additional structured data */
  readonly data: Readonly<Record<string, unknown>>;

  /** Error information if applicable */
  readonly error: LogError | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void | Promise<void>;
}

/**
 * Configuration for the logger.
 */
export interface LoggerConfig {
  /** Minimum level to log */
  readonly minLevel: Severity;

  /** Module name for this logger instance */
  readonly module: string;

  /** Transports to write to */
  readonly transports: LogTransport[];

  /** Run ID stamped on every entry */
  readonly runId?: UniqueId | undefined;
}

/**
 * Severity level ordering for comparison.
 */
const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'taskpilot',
  transports: [],
};

/**
 * Parses a level name such as `debug` or `WARN`.
 *
 * @returns The severity, or null for unknown names
 */
export function parseSeverity(name: string): Severity | null {
  const upper = name.trim().toUpperCase();
  for (const level of Object.values(Severity)) {
    if (level === upper) return level;
  }
  return null;
}

/**
 * Console transport - writes formatted lines to stderr.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;

  constructor(useColors: boolean = process.stderr.isTTY === true) {
    this.useColors = useColors;
  }

  write(entry: LogEntry): void {
    const parts: unknown[] = [`${this.formatPrefix(entry)} ${entry.message}`];
    if (Object.keys(entry.data).length > 0) {
      parts.push(entry.data);
    }
    if (entry.error && (entry.level === Severity.ERROR || entry.level === Severity.FATAL)) {
      parts.push(entry.error.stack ?? entry.error.message);
    }
    console.error(...parts);
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const module = entry.module;

    if (this.useColors) {
      const color = this.getLevelColor(entry.level);
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${module}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${module}]`;
  }

  private getLevelColor(level: Severity): string {
    switch (level) {
      case Severity.DEBUG: return '\x1b[90m'; // Gray
      case Severity.INFO: return '\x1b[32m';  // Green
      case Severity.WARN: return '\x1b[33m';  // Yellow
      case Severity.ERROR: return '\x1b[31m'; // Red
      case Severity.FATAL: return '\x1b[35m'; // Magenta
    }
  }
}

/**
 * Memory transport - stores logs in memory for testing/debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByRunId(runId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.runId === runId);
  }

  /**
   * Messages of all entries, optionally of one level, in order.
   */
  messages(level?: Severity): string[] {
    return this.entries.filter(e => level === undefined || e.level === level).map(e => e.message);
  }
}

/**
 * Structured logger for taskpilot.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *   module: 'agent.loop',
 *   minLevel: Severity.DEBUG,
 *   transports: [new ConsoleTransport()],
 * });
 *
 * logger.info('Run started', { objective });
 * logger.error('Step failed', { step: 3 }, error);
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;
  private readonly runId: UniqueId | null;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
    this.runId = config.runId ?? null;
  }

  get level(): Severity {
    return this.config.minLevel;
  }

  /**
   * Creates a child logger sharing this logger's transports and level.
   */
  child(context: { module?: string; runId?: UniqueId }): Logger {
    const runId = context.runId ?? this.runId;

    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      runId: runId ?? undefined,
    });
  }

  isLevelEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.WARN, message, data, error);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.FATAL, message, data, error);
  }

  // ============ Private Methods ============

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    this.writeEntry({
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      runId: this.runId,
      data: data ?? {},
      error: error ? formatError(error) : null,
    });
  }

  private writeEntry(entry: LogEntry): void {
    for (const transport of this.config.transports) {
      try {
        const pending = transport.write(entry);
        if (pending instanceof Promise) {
          pending.catch((transportError: unknown) => {
            console.error(`Logger transport '${transport.name}' failed:`, transportError);
          });
        }
      } catch (transportError) {
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: Error): LogError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code,
  };
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}
