/**
 * @fileoverview Core type definitions for the taskpilot runtime.
 *
 * These primitives are shared by every component of the loop: the
 * registry, the extractor, the memory store, the prompt assembler and
 * the loop itself.
 *
 * @module taskpilot/types/core
 */

/**
 * Unique identifier type used for runs and log entries.
 * Format: UUID v4 string.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Phase of a run.
 *
 * ```
 * INIT ──► STEPPING ──► TERMINATED
 *              │   ▲ ├──► STEP_LIMIT_REACHED
 *              └───┘ ├──► INTERRUPTED
 *                    └──► FATAL
 * ```
 *
 * @remarks
 * - INIT: run created, no step taken yet
 * - STEPPING: one step is in progress (self-transition per step)
 * - TERMINATED: the model chose the terminal action, or a failure failed open to it
 * - STEP_LIMIT_REACHED: the step budget ran out without a terminal action
 * - INTERRUPTED: an operator cancel was observed between steps
 * - FATAL: an unexpected error escaped step handling
 */
export enum AgentPhase {
  INIT = 'INIT',
  STEPPING = 'STEPPING',
  TERMINATED = 'TERMINATED',
  STEP_LIMIT_REACHED = 'STEP_LIMIT_REACHED',
  INTERRUPTED = 'INTERRUPTED',
  FATAL = 'FATAL',
}

/**
 * Severity levels for logging.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Reserved action name that ends a run successfully.
 */
export const TERMINAL_ACTION = 'finish';

/**
 * A structured instruction decoded from one model turn.
 * Wire shape: `{ "thought": string, "action": string, "args": object }`.
 */
export interface Action {
  /** Free-form rationale; null when the reply carried none */
  readonly thought: string | null;

  /** Registered tool name or the terminal keyword */
  readonly toolName: string;

  /** Arguments for the tool, never null */
  readonly arguments: Readonly<Record<string, unknown>>;
}

/**
 * One executed step, as kept by the memory store.
 */
export interface StepRecord {
  /** 1-based, strictly increasing within a run */
  readonly index: number;
  readonly thought: string | null;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;

  /** Tool output, truncated to the loop's result budget */
  readonly result: string;

  /** ISO-8601 time the step was recorded */
  readonly timestamp: string;
}

/**
 * An error raised while processing a step.
 */
export interface ErrorRecord {
  readonly stepIndex: number;
  readonly message: string;
  readonly timestamp: string;
}

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp from current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}

/**
 * Checks whether a tool name is the terminal keyword.
 * Matching ignores case and surrounding whitespace.
 */
export function isTerminalAction(toolName: string, keyword: string = TERMINAL_ACTION): boolean {
  return toolName.trim().toLowerCase() === keyword.toLowerCase();
}

/**
 * Narrows an unknown value to a plain JSON-like object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Cuts a string to `limit` characters, appending `suffix` when it was cut.
 */
export function truncate(text: string, limit: number, suffix: string = '...'): string {
  return text.length > limit ? text.slice(0, limit) + suffix : text;
}
