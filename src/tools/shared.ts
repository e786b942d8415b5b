/**
 * @fileoverview Helpers shared by the built-in tools.
 *
 * Handlers receive model-parsed arguments, so every tool parses its input
 * with a zod schema before doing anything. A failed parse becomes a
 * result string the model can read and correct.
 *
 * @module taskpilot/tools/shared
 */

import { exec, execFile } from 'node:child_process';
import { resolve } from 'node:path';
import { promisify } from 'node:util';
import { z } from 'zod';
import type { Tool, ToolDescriptor } from '../types/tools.types.js';

const execAsync = promisify(exec);
const execFileAsync = promisify(execFile);

/** Rule printed under result headers. */
export const SEPARATOR = '='.repeat(50);

/**
 * Environment the built-in tools act in.
 */
export interface ToolEnvironment {
  /** Base for relative paths and child processes. Default: `process.cwd()` */
  readonly cwd?: string;

  /** Variables read and written by `manage_environment`. Default: `process.env` */
  readonly env?: NodeJS.ProcessEnv;
}

/**
 * Bundles a descriptor with a handler that receives schema-checked input.
 *
 * @example
 * ```typescript
 * const ping = defineTool(
 *   { name: 'ping', description: 'Reply with pong', parameters: {} },
 *   z.object({}),
 *   async () => 'pong',
 * );
 * ```
 */
export function defineTool<S extends z.ZodTypeAny>(
  descriptor: ToolDescriptor,
  schema: S,
  run: (input: z.infer<S>) => Promise<string>,
): Tool {
  return {
    descriptor,
    async execute(args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        return `Invalid arguments for ${descriptor.name}: ${formatIssues(parsed.error)}`;
      }
      return run(parsed.data);
    },
  };
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function resolvePath(environment: ToolEnvironment, path: string): string {
  return resolve(environment.cwd ?? process.cwd(), path);
}

// ============ Child Processes ============

export interface ProcessOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly timedOut: boolean;
  /** The executable could not be found */
  readonly missing: boolean;
}

export interface ProcessOptions {
  readonly cwd?: string;
  readonly timeoutMs: number;
}

/**
 * Runs a command line through the shell. Never rejects.
 */
export async function runShell(command: string, options: ProcessOptions): Promise<ProcessOutput> {
  try {
    const { stdout, stderr } = await execAsync(command, {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      encoding: 'utf8',
      maxBuffer: 10 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0, timedOut: false, missing: false };
  } catch (error) {
    return failedProcess(error);
  }
}

/**
 * Runs an executable without a shell. Never rejects.
 */
export async function runFile(file: string, args: ReadonlyArray<string>, options: ProcessOptions): Promise<ProcessOutput> {
  try {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
      cwd: options.cwd,
      timeout: options.timeoutMs,
      encoding: 'utf8',
      maxBuffer: 10 * 1024 * 1024,
    });
    return { stdout, stderr, exitCode: 0, timedOut: false, missing: false };
  } catch (error) {
    return failedProcess(error);
  }
}

/**
 * Stdout, then stderr under a heading, then the exit code when non-zero.
 */
export function formatProcessOutput(output: ProcessOutput): string {
  let text = output.stdout;
  if (output.stderr) {
    text += `\nSTDERR:\n${output.stderr}`;
  }
  if (output.exitCode !== 0) {
    text += `\nReturn code: ${output.exitCode}`;
  }
  return text;
}

function failedProcess(error: unknown): ProcessOutput {
  if (!(error instanceof Error)) {
    return { stdout: '', stderr: String(error), exitCode: 1, timedOut: false, missing: false };
  }

  const stdout = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : error.message;
  const code = 'code' in error ? error.code : undefined;
  const timedOut = 'killed' in error && error.killed === true && 'signal' in error && error.signal === 'SIGTERM';

  return {
    stdout,
    stderr,
    exitCode: typeof code === 'number' ? code : 1,
    timedOut,
    missing: code === 'ENOENT',
  };
}
