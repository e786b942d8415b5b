/**
 * @fileoverview Agent module public exports.
 *
 * @module taskpilot/agent
 */

export {
  LifecycleController,
  TERMINAL_PHASES,
  type LifecycleEvents,
  type PhaseMetadata,
  type LifecycleError,
  type LifecycleState,
  type PhaseHistoryEntry,
} from './lifecycle.js';

export {
  AgentLoop,
  DEFAULT_AGENT_LOOP_CONFIG,
  type AgentLoopEvents,
  type AgentLoopConfig,
  type AgentLoopDeps,
  type RunOptions,
  type RunSummary,
  type RunResult,
} from './agent-loop.js';
