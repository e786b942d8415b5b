/**
 * @fileoverview Agent Loop - drives a run one step at a time.
 *
 * Each step assembles a prompt from the objective, the tool catalog and
 * the recent memory window, asks the model once, extracts an action and
 * either stops (terminal keyword) or dispatches the action through the
 * registry and records the result.
 *
 * Failure policy:
 * - a failed model call is replaced by the terminal action
 * - an exception while extracting, dispatching or recording is logged as
 *   an error record and followed by one fallback pass (field scan over the
 *   same reply); a second failure ends the run
 * - anything else escaping a step makes the run FATAL
 *
 * Interruption is cooperative and only observed between steps.
 *
 * @module taskpilot/agent/agent-loop
 */

import { EventEmitter } from 'eventemitter3';
import type { Action, StepRecord, ErrorRecord, UniqueId } from '../types/core.types.js';
import { AgentPhase, TERMINAL_ACTION, isTerminalAction, truncate } from '../types/core.types.js';
import { errorMessage } from '../types/errors.js';
import type { ModelInterface } from '../providers/base.js';
import type { ToolRegistry } from '../registry/tool-registry.js';
import type { MemoryStore } from '../memory/memory-store.js';
import type { ExtractionResult } from '../parsing/response-extractor.js';
import { extractAction, scanFields } from '../parsing/response-extractor.js';
import type { PromptContext } from '../prompt/prompt-assembler.js';
import { assemblePrompt } from '../prompt/prompt-assembler.js';
import { LifecycleController } from './lifecycle.js';
import { createLogger, type Logger } from '../observability/logger.js';

/**
 * Events emitted by the agent loop.
 */
export interface AgentLoopEvents {
  'run:start': (runId: UniqueId, objective: string) => void;
  'step:start': (stepNumber: number) => void;
  'model:response': (stepNumber: number, raw: string) => void;
  'action:parsed': (stepNumber: number, extraction: ExtractionResult) => void;
  'action:result': (stepNumber: number, record: StepRecord) => void;
  'run:end': (result: RunResult) => void;
}

/**
 * Tunables of the loop.
 */
export interface AgentLoopConfig {
  /** Step budget; the run ends with STEP_LIMIT_REACHED when it is spent */
  readonly maxSteps: number;

  /** Number of recent steps shown to the model */
  readonly memoryWindow: number;

  /** Characters of tool output kept per recorded step */
  readonly resultLimit: number;

  /** Characters of each result shown in the prompt */
  readonly promptResultLimit: number;

  /** Pause between steps */
  readonly stepDelayMs: number;

  readonly terminalKeyword: string;

  /** Static prompt context; step and maxSteps are filled in per step */
  readonly context: Omit<PromptContext, 'step' | 'maxSteps'>;
}

export const DEFAULT_AGENT_LOOP_CONFIG: AgentLoopConfig = {
  maxSteps: 15,
  memoryWindow: 3,
  resultLimit: 500,
  promptResultLimit: 200,
  stepDelayMs: 0,
  terminalKeyword: TERMINAL_ACTION,
  context: {},
};

/**
 * Collaborators of the loop.
 */
export interface AgentLoopDeps {
  readonly model: ModelInterface;
  readonly registry: ToolRegistry;
  readonly memory: MemoryStore;
  readonly logger?: Logger;
}

export interface RunOptions {
  /** Aborting requests interruption at the next step boundary */
  readonly signal?: AbortSignal;
}

/**
 * Execution summary of a finished run.
 */
export interface RunSummary {
  readonly objective: string;
  readonly stepsCompleted: number;
  readonly maxSteps: number;
  readonly memoryItems: number;
  readonly toolsUsed: number;
  readonly success: boolean;
}

/**
 * Result of a run.
 */
export interface RunResult {
  readonly runId: UniqueId;
  readonly status: AgentPhase;
  readonly stepsExecuted: number;
  /** Last action extracted, or the synthetic one after a model failure */
  readonly finalAction: Action | null;
  readonly summary: RunSummary;
  readonly errors: ReadonlyArray<ErrorRecord>;
  readonly durationMs: number;
}

interface StepOutcome {
  readonly terminal: boolean;
  readonly reason: string;
}

/** Set once the step's tool call has returned. */
interface DispatchProgress {
  dispatched: boolean;
}

/**
 * The loop that drives a single agent toward an objective.
 *
 * @example
 * ```typescript
 * const loop = new AgentLoop(
 *   { model: createModel(config.model), registry, memory: new MemoryStore() },
 *   { maxSteps: 10 },
 * );
 *
 * process.once('SIGINT', () => loop.interrupt());
 * const result = await loop.run('Count the TypeScript files in src');
 * console.log(`${result.status} after ${result.stepsExecuted} steps`);
 * ```
 */
export class AgentLoop extends EventEmitter<AgentLoopEvents> {
  private readonly config: AgentLoopConfig;
  private readonly model: ModelInterface;
  private readonly registry: ToolRegistry;
  private readonly memory: MemoryStore;
  private readonly logger: Logger;

  private lifecycle: LifecycleController | null = null;
  private abortController: AbortController | null = null;
  private finalAction: Action | null = null;
  private isRunning: boolean = false;

  constructor(deps: AgentLoopDeps, config: Partial<AgentLoopConfig> = {}) {
    super();
    this.config = { ...DEFAULT_AGENT_LOOP_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxSteps) || this.config.maxSteps < 1) {
      throw new RangeError(`maxSteps must be a positive integer, got ${this.config.maxSteps}`);
    }

    this.model = deps.model;
    this.registry = deps.registry;
    this.memory = deps.memory;
    this.logger = deps.logger ?? createLogger('agent.loop');
  }

  /**
   * Runs the loop until a terminal phase is reached.
   *
   * @throws Error if a run is already in progress on this loop
   */
  async run(objective: string, options: RunOptions = {}): Promise<RunResult> {
    if (this.isRunning) {
      throw new Error('A run is already in progress');
    }

    const startTime = Date.now();
    const lifecycle = new LifecycleController();
    const { runId } = lifecycle.getState();
    const logger = this.logger.child({ runId });
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();

    this.lifecycle = lifecycle;
    this.abortController = controller;
    this.finalAction = null;
    this.isRunning = true;

    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener('abort', forwardAbort, { once: true });

    lifecycle.on('transition', (from, to, reason) => {
      logger.debug(`Transition: ${from} → ${to}`, { reason });
    });

    this.emit('run:start', runId, objective);
    logger.info('Run started', { objective, maxSteps: this.config.maxSteps });

    try {
      while (!lifecycle.isTerminal()) {
        const stepNumber = lifecycle.getStepNumber();

        if (stepNumber >= this.config.maxSteps) {
          lifecycle.transition(AgentPhase.STEP_LIMIT_REACHED, `Maximum steps (${this.config.maxSteps}) reached`);
          break;
        }

        if (stepNumber > 0 && this.config.stepDelayMs > 0) {
          await pause(this.config.stepDelayMs, controller.signal);
        }

        if (controller.signal.aborted) {
          lifecycle.transition(AgentPhase.INTERRUPTED, 'Interrupted by operator');
          break;
        }

        lifecycle.transition(AgentPhase.STEPPING, `Step ${stepNumber + 1}`);
        const outcome = await this.executeStep(objective, lifecycle.getStepNumber(), logger);

        if (outcome.terminal) {
          lifecycle.transition(AgentPhase.TERMINATED, outcome.reason);
        }
      }
    } catch (error) {
      const reason = errorMessage(error);
      logger.fatal('Run failed', { reason }, error instanceof Error ? error : undefined);
      lifecycle.fail(reason);
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort);
      this.isRunning = false;
    }

    const result = this.createResult(objective, lifecycle, startTime);
    this.logOutcome(result, logger);
    this.emit('run:end', result);
    return result;
  }

  /**
   * Requests interruption. The current step finishes first.
   */
  interrupt(): void {
    this.abortController?.abort();
  }

  /**
   * Gets the current execution state.
   */
  getState(): {
    isRunning: boolean;
    phase: AgentPhase | null;
    stepNumber: number;
  } {
    return {
      isRunning: this.isRunning,
      phase: this.lifecycle?.getCurrentPhase() ?? null,
      stepNumber: this.lifecycle?.getStepNumber() ?? 0,
    };
  }

  // ============ Step Execution ============

  private async executeStep(objective: string, stepNumber: number, logger: Logger): Promise<StepOutcome> {
    this.emit('step:start', stepNumber);
    logger.debug(`Step ${stepNumber} of ${this.config.maxSteps}`);

    const prompt = assemblePrompt(
      {
        objective,
        tools: this.registry.describeAll(),
        memory: this.memory.recent(this.config.memoryWindow),
        context: {
          ...this.config.context,
          currentDirectory: this.config.context.currentDirectory ?? process.cwd(),
          step: stepNumber,
          maxSteps: this.config.maxSteps,
        },
      },
      {
        resultLimit: this.config.promptResultLimit,
        terminalKeyword: this.config.terminalKeyword,
      },
    );

    let raw: string;
    try {
      raw = await this.model.ask(prompt);
    } catch (error) {
      const message = `Model call failed: ${errorMessage(error)}`;
      logger.warn('Model call failed, finishing run', { step: stepNumber, model: this.model.name },
        error instanceof Error ? error : undefined);
      this.memory.addError(stepNumber, message);
      this.finalAction = { thought: message, toolName: this.config.terminalKeyword, arguments: {} };
      return { terminal: true, reason: 'Model call failed' };
    }

    this.emit('model:response', stepNumber, raw);
    logger.debug('Model response', { step: stepNumber, raw });

    const extractOptions = { terminalKeyword: this.config.terminalKeyword };

    const progress: DispatchProgress = { dispatched: false };

    try {
      return await this.processReply(stepNumber, () => extractAction(raw, extractOptions), logger, progress);
    } catch (error) {
      logger.error(`Error processing step ${stepNumber}`, { step: stepNumber, raw: truncate(raw, 1000) },
        error instanceof Error ? error : undefined);
      this.memory.addError(stepNumber, errorMessage(error));
    }

    if (progress.dispatched) {
      logger.warn('Step failed after dispatch, skipping fallback pass', { step: stepNumber });
      return { terminal: false, reason: '' };
    }

    try {
      return await this.processReply(stepNumber, () => scanFields(raw, extractOptions), logger, progress);
    } catch (error) {
      logger.error('Fallback pass also failed, finishing run', { step: stepNumber },
        error instanceof Error ? error : undefined);
      this.memory.addError(stepNumber, `Fallback failed: ${errorMessage(error)}`);
      return { terminal: true, reason: 'Fallback pass failed' };
    }
  }

  private async processReply(
    stepNumber: number,
    extract: () => ExtractionResult,
    logger: Logger,
    progress: DispatchProgress,
  ): Promise<StepOutcome> {
    const extraction = extract();
    this.emit('action:parsed', stepNumber, extraction);

    for (const note of extraction.notes) {
      logger.debug(`Extraction: ${note}`, { step: stepNumber });
    }
    if (extraction.degraded) {
      logger.warn('Reply parsed in degraded mode', {
        step: stepNumber,
        stage: extraction.stage,
        actionDefaulted: extraction.actionDefaulted,
      });
    }

    const { action } = extraction;
    this.finalAction = action;
    logger.info(`Action: ${action.toolName}`, { step: stepNumber, thought: action.thought, args: action.arguments });

    if (isTerminalAction(action.toolName, this.config.terminalKeyword)) {
      return { terminal: true, reason: 'Model chose the terminal action' };
    }

    const result = await this.registry.invoke(action.toolName, action.arguments);
    progress.dispatched = true;

    const record: StepRecord = {
      index: this.memory.nextIndex(),
      thought: action.thought,
      toolName: action.toolName,
      arguments: action.arguments,
      result: truncate(result, this.config.resultLimit, ''),
      timestamp: new Date().toISOString(),
    };
    this.memory.addStep(record);
    this.emit('action:result', stepNumber, record);
    logger.debug('Step recorded', { step: stepNumber, index: record.index, resultLength: result.length });

    return { terminal: false, reason: '' };
  }

  // ============ Helper Methods ============

  private createResult(objective: string, lifecycle: LifecycleController, startTime: number): RunResult {
    const status = lifecycle.getCurrentPhase();
    const stepsExecuted = lifecycle.getStepNumber();

    return {
      runId: lifecycle.getState().runId,
      status,
      stepsExecuted,
      finalAction: this.finalAction,
      summary: {
        objective,
        stepsCompleted: stepsExecuted,
        maxSteps: this.config.maxSteps,
        memoryItems: this.memory.size,
        toolsUsed: this.memory.totalToolUses(),
        success: status === AgentPhase.TERMINATED,
      },
      errors: this.memory.errors(),
      durationMs: Date.now() - startTime,
    };
  }

  private logOutcome(result: RunResult, logger: Logger): void {
    const data = { status: result.status, steps: result.stepsExecuted, durationMs: result.durationMs };

    switch (result.status) {
      case AgentPhase.TERMINATED:
        logger.info('Run finished', data);
        break;
      case AgentPhase.STEP_LIMIT_REACHED:
        logger.warn(`Maximum steps (${this.config.maxSteps}) reached`, data);
        break;
      case AgentPhase.INTERRUPTED:
        logger.warn('Run interrupted', data);
        break;
      default:
        logger.error('Run ended abnormally', data);
        break;
    }
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts.
 */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = (): void => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}
