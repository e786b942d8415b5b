/**
 * @fileoverview Error classes raised by the runtime.
 *
 * Each error carries a stable `code` for programmatic handling. Parse,
 * validation and handler failures never surface as these: the extractor
 * and the registry turn them into values. What remains are programming
 * errors, corrupted state, model transport failures and bad configuration.
 *
 * @module taskpilot/types/errors
 */

export type ErrorCode =
  | 'DUPLICATE_TOOL'
  | 'MEMORY_IMPORT_FAILED'
  | 'MEMORY_CORRUPTED'
  | 'MODEL_ERROR'
  | 'CONFIG_INVALID'
  | 'USAGE';

export class TaskpilotError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Raised by `ToolRegistry.register` when the name is taken.
 */
export class DuplicateToolError extends TaskpilotError {
  readonly toolName: string;

  constructor(toolName: string) {
    super('DUPLICATE_TOOL', `Tool '${toolName}' is already registered`);
    this.toolName = toolName;
  }
}

/**
 * Raised when a memory snapshot does not validate. The store is unchanged.
 */
export class MemoryImportError extends TaskpilotError {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>) {
    super('MEMORY_IMPORT_FAILED', `Invalid memory snapshot: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Raised when a write would break the store's invariants.
 */
export class MemoryCorruptionError extends TaskpilotError {
  constructor(message: string) {
    super('MEMORY_CORRUPTED', message);
  }
}

export class ModelError extends TaskpilotError {
  readonly provider: string;
  readonly status: number | null;

  constructor(provider: string, message: string, status: number | null = null, cause?: unknown) {
    super('MODEL_ERROR', `${provider}: ${message}`, { cause });
    this.provider = provider;
    this.status = status;
  }
}

export class ConfigError extends TaskpilotError {
  readonly issues: ReadonlyArray<string>;

  constructor(issues: ReadonlyArray<string>, source?: string) {
    const where = source !== undefined ? ` (${source})` : '';
    super('CONFIG_INVALID', `Invalid configuration${where}: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Raised for a malformed command line.
 */
export class UsageError extends TaskpilotError {
  constructor(message: string) {
    super('USAGE', message);
  }
}

/**
 * Extracts a readable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
