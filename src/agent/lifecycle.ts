/**
 * @fileoverview Run Lifecycle Controller - Manages run phase transitions.
 *
 * The lifecycle controller enforces the run state machine, ensuring
 * valid transitions and providing hooks for observability. It is the
 * authoritative source for "what phase is the run in?"
 *
 * State Machine:
 * ```
 *           ┌──────┐
 *           ▼      │ next step
 *   INIT ──► STEPPING ──► TERMINATED
 *     │        ├──────► STEP_LIMIT_REACHED
 *     ├────────┼──────► INTERRUPTED
 *     └────────┴──────► FATAL
 * ```
 *
 * @module taskpilot/agent/lifecycle
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { AgentPhase, createUniqueId, createTimestamp } from '../types/core.types.js';

/**
 * Events emitted during lifecycle transitions.
 */
export interface LifecycleEvents {
  'phase:enter': (phase: AgentPhase, metadata: PhaseMetadata) => void;
  'phase:exit': (phase: AgentPhase, metadata: PhaseMetadata) => void;
  'transition': (from: AgentPhase, to: AgentPhase, reason: string) => void;
  'error': (error: LifecycleError) => void;
}

/**
 * Metadata associated with a phase.
 */
export interface PhaseMetadata {
  readonly enteredAt: Timestamp;
  readonly stepNumber: number;
  readonly reason: string;
  readonly data: Readonly<Record<string, unknown>>;
}

/**
 * Error during lifecycle operations.
 */
export interface LifecycleError {
  readonly code: 'TERMINAL_STATE' | 'INVALID_TRANSITION';
  readonly message: string;
  readonly phase: AgentPhase;
  readonly attemptedTransition?: AgentPhase;
}

/**
 * Snapshot of current lifecycle state.
 */
export interface LifecycleState {
  readonly runId: UniqueId;
  readonly currentPhase: AgentPhase;
  readonly previousPhase: AgentPhase | null;
  readonly stepNumber: number;
  readonly phaseHistory: ReadonlyArray<PhaseHistoryEntry>;
  readonly startedAt: Timestamp;
  readonly lastTransitionAt: Timestamp;
  readonly isTerminal: boolean;
}

/**
 * Entry in the phase history.
 */
export interface PhaseHistoryEntry {
  readonly phase: AgentPhase;
  readonly stepNumber: number;
  readonly enteredAt: Timestamp;
  readonly exitedAt: Timestamp | null;
  readonly reason: string;
}

/**
 * Valid transitions from each phase.
 * This is the authoritative definition of the state machine.
 */
const VALID_TRANSITIONS: ReadonlyMap<AgentPhase, ReadonlyArray<AgentPhase>> = new Map([
  [AgentPhase.INIT, [AgentPhase.STEPPING, AgentPhase.INTERRUPTED, AgentPhase.FATAL]],
  [AgentPhase.STEPPING, [
    AgentPhase.STEPPING,
    AgentPhase.TERMINATED,
    AgentPhase.STEP_LIMIT_REACHED,
    AgentPhase.INTERRUPTED,
    AgentPhase.FATAL,
  ]],
  [AgentPhase.TERMINATED, []],
  [AgentPhase.STEP_LIMIT_REACHED, []],
  [AgentPhase.INTERRUPTED, []],
  [AgentPhase.FATAL, []],
]);

/**
 * Terminal phases that cannot transition to other phases.
 */
export const TERMINAL_PHASES: ReadonlySet<AgentPhase> = new Set([
  AgentPhase.TERMINATED,
  AgentPhase.STEP_LIMIT_REACHED,
  AgentPhase.INTERRUPTED,
  AgentPhase.FATAL,
]);

/**
 * Manages run lifecycle and state transitions.
 *
 * The controller ensures:
 * 1. Only valid transitions occur
 * 2. Phase history is recorded
 * 3. Events are emitted for observability
 * 4. Terminal states are respected
 *
 * Every entry into STEPPING starts a new step and increments the step number.
 *
 * @example
 * ```typescript
 * const lifecycle = new LifecycleController(runId);
 * lifecycle.on('transition', (from, to, reason) => {
 *   logger.debug(`Transition: ${from} → ${to} (${reason})`);
 * });
 *
 * lifecycle.transition(AgentPhase.STEPPING, 'Step 1');
 * lifecycle.transition(AgentPhase.TERMINATED, 'Model chose finish');
 * ```
 */
export class LifecycleController extends EventEmitter<LifecycleEvents> {
  private readonly runId: UniqueId;
  private currentPhase: AgentPhase;
  private previousPhase: AgentPhase | null;
  private stepNumber: number;
  private readonly phaseHistory: PhaseHistoryEntry[];
  private readonly startedAt: Timestamp;
  private lastTransitionAt: Timestamp;
  private currentPhaseEntry: PhaseHistoryEntry | null;

  constructor(runId?: UniqueId) {
    super();
    this.runId = runId ?? createUniqueId(uuidv4());
    this.currentPhase = AgentPhase.INIT;
    this.previousPhase = null;
    this.stepNumber = 0;
    this.phaseHistory = [];
    this.startedAt = createTimestamp();
    this.lastTransitionAt = this.startedAt;
    this.currentPhaseEntry = null;

    this.enterPhase(AgentPhase.INIT, 'Run created');
  }

  /**
   * Gets the current lifecycle state.
   */
  getState(): LifecycleState {
    return {
      runId: this.runId,
      currentPhase: this.currentPhase,
      previousPhase: this.previousPhase,
      stepNumber: this.stepNumber,
      phaseHistory: [...this.phaseHistory],
      startedAt: this.startedAt,
      lastTransitionAt: this.lastTransitionAt,
      isTerminal: this.isTerminal(),
    };
  }

  getCurrentPhase(): AgentPhase {
    return this.currentPhase;
  }

  getStepNumber(): number {
    return this.stepNumber;
  }

  isTerminal(): boolean {
    return TERMINAL_PHASES.has(this.currentPhase);
  }

  /**
   * Checks if a transition to the target phase is valid.
   */
  canTransition(targetPhase: AgentPhase): boolean {
    const validTargets = VALID_TRANSITIONS.get(this.currentPhase);
    return validTargets !== undefined && validTargets.includes(targetPhase);
  }

  /**
   * Transitions to a new phase.
   *
   * @throws Error if the transition is invalid
   */
  transition(
    targetPhase: AgentPhase,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    if (this.isTerminal()) {
      this.reject('TERMINAL_STATE', `Cannot transition from terminal state '${this.currentPhase}'`, targetPhase);
    }

    if (!this.canTransition(targetPhase)) {
      this.reject('INVALID_TRANSITION', `Invalid transition: '${this.currentPhase}' → '${targetPhase}'`, targetPhase);
    }

    this.exitPhase();

    this.previousPhase = this.currentPhase;
    this.currentPhase = targetPhase;
    this.lastTransitionAt = createTimestamp();

    if (targetPhase === AgentPhase.STEPPING) {
      this.stepNumber++;
    }

    this.emit('transition', this.previousPhase, this.currentPhase, reason);
    this.enterPhase(targetPhase, reason, data);
  }

  /**
   * Forces a transition to FATAL from any non-terminal phase.
   * This is an escape hatch for unrecoverable errors.
   */
  fail(reason: string): void {
    if (this.isTerminal()) {
      return;
    }
    this.transition(AgentPhase.FATAL, reason, { forced: true });
  }

  // ============ Private Methods ============

  private reject(code: LifecycleError['code'], message: string, attempted: AgentPhase): never {
    const error: LifecycleError = {
      code,
      message,
      phase: this.currentPhase,
      attemptedTransition: attempted,
    };
    this.emit('error', error);
    throw new Error(message);
  }

  private enterPhase(
    phase: AgentPhase,
    reason: string,
    data: Record<string, unknown> = {},
  ): void {
    const now = createTimestamp();

    this.currentPhaseEntry = {
      phase,
      stepNumber: this.stepNumber,
      enteredAt: now,
      exitedAt: null,
      reason,
    };

    this.emit('phase:enter', phase, {
      enteredAt: now,
      stepNumber: this.stepNumber,
      reason,
      data,
    });
  }

  private exitPhase(): void {
    if (!this.currentPhaseEntry) {
      return;
    }

    this.phaseHistory.push({
      ...this.currentPhaseEntry,
      exitedAt: createTimestamp(),
    });

    this.emit('phase:exit', this.currentPhase, {
      enteredAt: this.currentPhaseEntry.enteredAt,
      stepNumber: this.currentPhaseEntry.stepNumber,
      reason: this.currentPhaseEntry.reason,
      data: {},
    });
    this.currentPhaseEntry = null;
  }
}
