/**
 * @fileoverview Prompt Assembler - renders the per-step prompt.
 *
 * Pure functions: objective, tool catalog, recent memory window and optional
 * context go in, a single string comes out. Context keys that are absent
 * produce no output.
 *
 * @module taskpilot/prompt/prompt-assembler
 */

import type { Action, StepRecord } from '../types/core.types.js';
import { TERMINAL_ACTION, truncate } from '../types/core.types.js';
import type { ToolDescriptor } from '../types/tools.types.js';
import { groupByCategory } from '../registry/tool-categories.js';

/** Per-entry budget for tool results shown in the prompt. */
export const DEFAULT_PROMPT_RESULT_LIMIT = 200;

/**
 * Optional facts about the run. Only keys that are set are rendered.
 */
export interface PromptContext {
  readonly currentDirectory?: string;
  readonly step?: number;
  readonly maxSteps?: number;
  readonly environment?: string;
  readonly constraints?: ReadonlyArray<string>;
  readonly preferences?: Readonly<Record<string, unknown>>;
  /** Preformatted time; the assembler never reads the clock */
  readonly timestamp?: string;
}

export interface PromptInput {
  readonly objective: string;
  readonly tools: ReadonlyMap<string, ToolDescriptor>;
  /** Memory window, oldest first */
  readonly memory: ReadonlyArray<StepRecord>;
  readonly context?: PromptContext;
}

export interface PromptOptions {
  readonly resultLimit?: number;
  readonly terminalKeyword?: string;
}

export interface RecoveryPromptInput {
  readonly objective: string;
  readonly error: string;
  readonly lastAction: Action;
  readonly suggestions?: ReadonlyArray<string>;
}

/**
 * Builds the main step prompt.
 *
 * @example
 * ```typescript
 * const prompt = assemblePrompt({
 *   objective: 'Count the TypeScript files in src',
 *   tools: registry.describeAll(),
 *   memory: memory.recent(3),
 *   context: { currentDirectory: process.cwd() },
 * });
 * ```
 */
export function assemblePrompt(input: PromptInput, options: PromptOptions = {}): string {
  const terminalKeyword = options.terminalKeyword ?? TERMINAL_ACTION;
  const resultLimit = options.resultLimit ?? DEFAULT_PROMPT_RESULT_LIMIT;

  const sections = [
    'You are a task-execution agent. You work toward one objective using a fixed set of tools.',
    `OBJECTIVE: ${input.objective}`,
    `AVAILABLE TOOLS:\n${formatToolCatalog(input.tools)}`,
    [
      'RULES:',
      '1. Take exactly one action per step.',
      '2. Reply with a single JSON object and nothing else.',
      '3. Use this shape:',
      '   {"thought": "why this step", "action": "tool_name", "args": {"parameter": "value"}}',
      `4. Use "${terminalKeyword}" as the action once the objective is complete.`,
      '5. If a tool reports an error, read it and try another approach.',
    ].join('\n'),
  ];

  const context = formatContext(input.context ?? {});
  if (context) {
    sections.push(`CONTEXT:\n${context}`);
  }

  sections.push(`RECENT ACTIONS:\n${formatMemory(input.memory, resultLimit)}`);
  sections.push('What is your next action? Reply with one JSON object only.');

  return sections.join('\n\n');
}

/**
 * Builds a prompt asking the model to recover from a failed step.
 */
export function assembleRecoveryPrompt(input: RecoveryPromptInput): string {
  const lastAction = JSON.stringify(
    { thought: input.lastAction.thought, action: input.lastAction.toolName, args: input.lastAction.arguments },
    null,
    2,
  );

  const sections = [
    'The last action failed. Work out what went wrong and choose a different next step.',
    `OBJECTIVE: ${input.objective}`,
    `ERROR: ${input.error}`,
    `LAST ACTION:\n${lastAction}`,
  ];

  if (input.suggestions && input.suggestions.length > 0) {
    sections.push(`SUGGESTIONS:\n${input.suggestions.map(s => `- ${s}`).join('\n')}`);
  }

  sections.push('What is your recovery action? Reply with one JSON object only.');
  return sections.join('\n\n');
}

/**
 * Tool descriptors grouped by category. Required parameters carry `*`.
 */
export function formatToolCatalog(tools: ReadonlyMap<string, ToolDescriptor>): string {
  if (tools.size === 0) {
    return 'No tools available.';
  }

  const lines: string[] = [];
  for (const group of groupByCategory(tools.keys())) {
    if (lines.length > 0) lines.push('');
    lines.push(`${group.category} Tools:`);

    for (const name of group.tools) {
      const descriptor = tools.get(name);
      if (!descriptor) continue;
      const params = Object.entries(descriptor.parameters)
        .map(([param, spec]) => `${param}${spec.required ? '*' : ''}: ${spec.type}`)
        .join(', ');
      lines.push(`  - ${name}(${params}): ${descriptor.description}`);
    }
  }

  return lines.join('\n');
}

/**
 * Memory entries oldest first, thoughts and results cut to `resultLimit`
 * characters.
 */
export function formatMemory(memory: ReadonlyArray<StepRecord>, resultLimit: number = DEFAULT_PROMPT_RESULT_LIMIT): string {
  if (memory.length === 0) {
    return 'No previous actions taken.';
  }

  return memory
    .map(step => {
      const thought = truncate(step.thought ?? 'No thought', resultLimit);
      return `Step ${step.index}: ${step.toolName} - ${thought}\nResult: ${truncate(step.result, resultLimit)}`;
    })
    .join('\n\n');
}

/**
 * Renders only the keys that are present; empty string when none are.
 */
export function formatContext(context: PromptContext): string {
  const lines: string[] = [];

  if (context.currentDirectory !== undefined) {
    lines.push(`Current Directory: ${context.currentDirectory}`);
  }
  if (context.step !== undefined) {
    lines.push(context.maxSteps !== undefined
      ? `Step: ${context.step} of ${context.maxSteps}`
      : `Step: ${context.step}`);
  }
  if (context.environment !== undefined) {
    lines.push(`Environment: ${context.environment}`);
  }
  if (context.constraints && context.constraints.length > 0) {
    lines.push('Constraints:', ...context.constraints.map(c => `- ${c}`));
  }
  if (context.preferences && Object.keys(context.preferences).length > 0) {
    lines.push('Preferences:');
    for (const [key, value] of Object.entries(context.preferences)) {
      lines.push(`- ${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`);
    }
  }
  if (context.timestamp !== undefined) {
    lines.push(`Current Time: ${context.timestamp}`);
  }

  return lines.join('\n');
}
