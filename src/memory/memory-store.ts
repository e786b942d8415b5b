/**
 * @fileoverview Memory Store - bounded history of a run.
 *
 * Holds the most recent step records (strict FIFO, default capacity 50),
 * an unbounded error log, per-tool usage counters and a small key/value
 * context cache. The store can be exported to, and restored from, a plain
 * object with the keys `steps`, `errors`, `tools_usage` and
 * `context_cache`.
 *
 * @module taskpilot/memory/memory-store
 */

import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ErrorRecord, StepRecord } from '../types/core.types.js';
import { MemoryCorruptionError, MemoryImportError } from '../types/errors.js';

export const DEFAULT_MEMORY_CAPACITY = 50;

export interface MemoryStoreConfig {
  /** Maximum number of step records kept. Default: 50 */
  readonly capacity?: number;
}

const WireStepSchema = z.object({
  step: z.number().int().min(1),
  thought: z.string().nullable(),
  action: z.string(),
  args: z.record(z.unknown()),
  result: z.string(),
  timestamp: z.string(),
});

const WireErrorSchema = z.object({
  step: z.number().int().min(0),
  error: z.string(),
  timestamp: z.string(),
});

/**
 * Serialized form of a memory store.
 */
export const MemorySnapshotSchema = z.object({
  steps: z.array(WireStepSchema).default([]),
  errors: z.array(WireErrorSchema).default([]),
  tools_usage: z.record(z.number().int().min(0)).default({}),
  context_cache: z.record(z.unknown()).default({}),
});

export type MemorySnapshot = z.infer<typeof MemorySnapshotSchema>;

/**
 * Bounded per-run memory.
 *
 * @example
 * ```typescript
 * const memory = new MemoryStore({ capacity: 20 });
 * memory.addStep({ index: 1, thought: null, toolName: 'list_directory', arguments: {}, result: 'a.txt', timestamp });
 * memory.recent(3); // last three records, oldest first
 * ```
 */
export class MemoryStore {
  readonly capacity: number;

  private steps: StepRecord[] = [];
  private errorLog: ErrorRecord[] = [];
  private usage: Map<string, number> = new Map();
  private contextCache: Map<string, unknown> = new Map();

  /** Highest index ever recorded; survives eviction */
  private lastIndex = 0;

  constructor(config: MemoryStoreConfig = {}) {
    const capacity = config.capacity ?? DEFAULT_MEMORY_CAPACITY;
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Memory capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.steps.length;
  }

  /**
   * Index the next recorded step must use.
   */
  nextIndex(): number {
    return this.lastIndex + 1;
  }

  /**
   * Appends a step, evicting the oldest record beyond capacity.
   *
   * @throws MemoryCorruptionError if the index does not increase
   */
  addStep(record: StepRecord): void {
    if (!Number.isInteger(record.index) || record.index <= this.lastIndex) {
      throw new MemoryCorruptionError(
        `Step index ${record.index} does not follow the last recorded index ${this.lastIndex}`,
      );
    }

    this.steps.push(record);
    this.lastIndex = record.index;
    this.usage.set(record.toolName, (this.usage.get(record.toolName) ?? 0) + 1);

    while (this.steps.length > this.capacity) {
      this.steps.shift();
    }
  }

  /**
   * The last `count` records, oldest first. Zero or less gives none.
   */
  recent(count: number): StepRecord[] {
    if (count <= 0) return [];
    return this.steps.slice(-Math.floor(count));
  }

  all(): StepRecord[] {
    return [...this.steps];
  }

  addError(stepIndex: number, message: string): ErrorRecord {
    const record: ErrorRecord = { stepIndex, message, timestamp: new Date().toISOString() };
    this.errorLog.push(record);
    return record;
  }

  errors(): ErrorRecord[] {
    return [...this.errorLog];
  }

  usageCounts(): Record<string, number> {
    return Object.fromEntries(this.usage);
  }

  totalToolUses(): number {
    let total = 0;
    for (const count of this.usage.values()) total += count;
    return total;
  }

  /**
   * Steps whose thought, tool name or result contains `query`, ignoring case.
   */
  search(query: string): StepRecord[] {
    const needle = query.toLowerCase();
    return this.steps.filter(step =>
      [step.thought ?? '', step.toolName, step.result].join(' ').toLowerCase().includes(needle),
    );
  }

  /**
   * Short plain-text digest of the history.
   */
  summary(): string {
    if (this.steps.length === 0) {
      return 'No previous actions taken.';
    }

    return [
      `Recent actions: ${this.recent(5).map(step => step.toolName).join(', ')}`,
      `Tools used: ${[...this.usage.keys()].join(', ')}`,
      `Total steps: ${this.steps.length}`,
      `Errors encountered: ${this.errorLog.length}`,
    ].join('\n');
  }

  getContext(key: string): unknown {
    return this.contextCache.get(key);
  }

  setContext(key: string, value: unknown): void {
    this.contextCache.set(key, value);
  }

  clear(): void {
    this.steps = [];
    this.errorLog = [];
    this.usage = new Map();
    this.contextCache = new Map();
    this.lastIndex = 0;
  }

  export(): MemorySnapshot {
    return {
      steps: this.steps.map(step => ({
        step: step.index,
        thought: step.thought,
        action: step.toolName,
        args: { ...step.arguments },
        result: step.result,
        timestamp: step.timestamp,
      })),
      errors: this.errorLog.map(error => ({
        step: error.stepIndex,
        error: error.message,
        timestamp: error.timestamp,
      })),
      tools_usage: this.usageCounts(),
      context_cache: Object.fromEntries(this.contextCache),
    };
  }

  /**
   * Replaces the whole state with a snapshot. Either everything is
   * applied or the store is left untouched.
   *
   * @throws MemoryImportError if the snapshot does not validate
   */
  import(snapshot: unknown): void {
    const parsed = MemorySnapshotSchema.safeParse(snapshot);
    if (!parsed.success) {
      throw new MemoryImportError(
        parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      );
    }

    const data = parsed.data;
    const steps: StepRecord[] = data.steps.map(step => ({
      index: step.step,
      thought: step.thought,
      toolName: step.action,
      arguments: step.args,
      result: step.result,
      timestamp: step.timestamp,
    }));

    for (let i = 1; i < steps.length; i++) {
      const previous = steps[i - 1];
      const current = steps[i];
      if (previous && current && current.index <= previous.index) {
        throw new MemoryImportError([`steps.${i}.step: index ${current.index} does not follow ${previous.index}`]);
      }
    }

    this.steps = steps.slice(-this.capacity);
    this.errorLog = data.errors.map(error => ({
      stepIndex: error.step,
      message: error.error,
      timestamp: error.timestamp,
    }));
    this.usage = new Map(Object.entries(data.tools_usage));
    this.contextCache = new Map(Object.entries(data.context_cache));
    this.lastIndex = steps.at(-1)?.index ?? 0;
  }

  /**
   * Writes the snapshot as indented JSON.
   */
  async saveToFile(path: string): Promise<void> {
    await writeFile(path, JSON.stringify(this.export(), null, 2), 'utf-8');
  }

  /**
   * Reads and imports a snapshot written by {@link saveToFile}.
   *
   * @throws MemoryImportError if the file is not JSON or does not validate
   */
  async loadFromFile(path: string): Promise<void> {
    const raw = await readFile(path, 'utf-8');
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new MemoryImportError([`${path}: ${error instanceof Error ? error.message : 'not valid JSON'}`]);
    }
    this.import(data);
  }
}
