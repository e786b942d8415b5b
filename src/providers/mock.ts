/**
 * @fileoverview Mock Provider
 *
 * Replays scripted replies in order and records every prompt it receives.
 * Once the script runs out it answers with the terminal action, so a run
 * against the mock always ends.
 */

import { ModelProvider, type ModelInterface } from './base.js';

/**
 * A scripted reply. An `Error` is thrown instead of returned.
 */
export type ScriptedReply = string | Error | ((prompt: string, call: number) => string);

export const MOCK_FINISH_REPLY = JSON.stringify({
  thought: 'No scripted reply left, finishing.',
  action: 'finish',
  args: {},
});

/**
 * Scripted model for tests and dry runs.
 *
 * @example
 * ```typescript
 * const model = new MockModel([
 *   '{"thought": "look", "action": "list_directory", "args": {}}',
 *   '{"thought": "done", "action": "finish", "args": {}}',
 * ]);
 * ```
 */
export class MockModel implements ModelInterface {
  readonly name = ModelProvider.MOCK;

  /** Prompts received, in order */
  readonly prompts: string[] = [];

  private readonly script: ScriptedReply[];

  constructor(script: ReadonlyArray<ScriptedReply> = []) {
    this.script = [...script];
  }

  get calls(): number {
    return this.prompts.length;
  }

  async ask(prompt: string): Promise<string> {
    const call = this.prompts.length;
    this.prompts.push(prompt);

    const reply = this.script[call];
    if (reply === undefined) {
      return MOCK_FINISH_REPLY;
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === 'function' ? reply(prompt, call) : reply;
  }
}
