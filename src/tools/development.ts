/**
 * @fileoverview Development tools: git, npm packages and test runners.
 *
 * Each tool builds an argument vector and runs it without a shell. The
 * builders are exported so the command lines can be checked without
 * spawning anything.
 *
 * @module taskpilot/tools/development
 */

import { z } from 'zod';
import type { Tool } from '../types/tools.types.js';
import { defineTool, formatProcessOutput, runFile, type ToolEnvironment } from './shared.js';

export const GIT_TIMEOUT_MS = 30_000;
export const PACKAGE_TIMEOUT_MS = 60_000;
export const TEST_TIMEOUT_MS = 120_000;

/**
 * An executable and its arguments, or a message explaining why none was
 * built.
 */
export type CommandPlan =
  | { readonly ok: true; readonly file: string; readonly args: ReadonlyArray<string> }
  | { readonly ok: false; readonly message: string };

// ============ Input Schemas ============

const GitInputSchema = z.object({
  operation: z.enum(['status', 'add', 'commit', 'push', 'pull', 'log', 'branch', 'diff', 'checkout', 'fetch']),
  args: z.array(z.string()).default([]),
  message: z.string().optional(),
});

const PackageInputSchema = z.object({
  operation: z.enum(['install', 'uninstall', 'list', 'show', 'search']),
  package: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  dev: z.boolean().default(false),
});

const TestInputSchema = z.object({
  test_path: z.string().default('.'),
  test_runner: z.enum(['npm', 'vitest', 'jest', 'pytest']).default('npm'),
  verbose: z.boolean().default(true),
});

type GitInput = z.infer<typeof GitInputSchema>;
type PackageInput = z.infer<typeof PackageInputSchema>;
type TestInput = z.infer<typeof TestInputSchema>;

// ============ Command Builders ============

export function buildGitCommand(input: GitInput): CommandPlan {
  if (input.operation === 'commit' && !input.message && !input.args.includes('-m')) {
    return { ok: false, message: 'Commit message is required for commit operation' };
  }

  const args: string[] = [input.operation];
  if (input.operation === 'commit' && input.message) {
    args.push('-m', input.message);
  }
  args.push(...input.args);
  return { ok: true, file: 'git', args };
}

export function buildPackageCommand(input: PackageInput): CommandPlan {
  if (input.operation === 'list') {
    return { ok: true, file: 'npm', args: ['ls', '--depth=0'] };
  }

  if (!input.package) {
    return { ok: false, message: `Package name is required for ${input.operation} operation` };
  }

  switch (input.operation) {
    case 'install': {
      const spec = input.version ? `${input.package}@${input.version}` : input.package;
      return { ok: true, file: 'npm', args: input.dev ? ['install', '--save-dev', spec] : ['install', spec] };
    }
    case 'uninstall':
      return { ok: true, file: 'npm', args: ['uninstall', input.package] };
    case 'show':
      return { ok: true, file: 'npm', args: ['view', input.package] };
    case 'search':
      return { ok: true, file: 'npm', args: ['search', input.package] };
  }
}

export function buildTestCommand(input: TestInput): CommandPlan {
  switch (input.test_runner) {
    case 'npm':
      return { ok: true, file: 'npm', args: ['test'] };
    case 'vitest':
      return {
        ok: true,
        file: 'npx',
        args: ['vitest', 'run', ...(input.test_path === '.' ? [] : [input.test_path]), ...(input.verbose ? ['--reporter=verbose'] : [])],
      };
    case 'jest':
      return {
        ok: true,
        file: 'npx',
        args: ['jest', ...(input.test_path === '.' ? [] : [input.test_path]), ...(input.verbose ? ['--verbose'] : [])],
      };
    case 'pytest':
      return { ok: true, file: 'pytest', args: [input.test_path, ...(input.verbose ? ['-v'] : []), '--tb=short'] };
  }
}

// ============ Tool Implementations ============

export function createGitTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'git_operations',
      description: 'Perform Git operations: status, add, commit, push, pull, log, branch, diff',
      parameters: {
        operation: { type: 'string', required: true, description: 'Git operation: status, add, commit, push, pull, log, branch, diff, checkout, fetch' },
        args: { type: 'array', required: false, default: [], description: 'Additional arguments for the git command' },
        message: { type: 'string', required: false, description: 'Commit message (for commit operation)' },
      },
    },
    GitInputSchema,
    async input => {
      const plan = buildGitCommand(input);
      if (!plan.ok) return plan.message;

      const result = await runFile(plan.file, plan.args, { cwd: environment.cwd, timeoutMs: GIT_TIMEOUT_MS });
      if (result.missing) return 'Git is not installed or not in PATH';
      if (result.timedOut) return `Git ${input.operation} timed out`;

      return formatProcessOutput(result) || `Git ${input.operation} completed successfully`;
    },
  );
}

export function createPackageTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'manage_packages',
      description: 'Manage npm packages: install, uninstall, list, show, search',
      parameters: {
        operation: { type: 'string', required: true, description: 'Operation: install, uninstall, list, show, search' },
        package: { type: 'string', required: false, description: 'Package name or search term' },
        version: { type: 'string', required: false, description: 'Version or range to install' },
        dev: { type: 'boolean', required: false, default: false, description: 'Install as a development dependency' },
      },
    },
    PackageInputSchema,
    async input => {
      const plan = buildPackageCommand(input);
      if (!plan.ok) return plan.message;

      const result = await runFile(plan.file, plan.args, { cwd: environment.cwd, timeoutMs: PACKAGE_TIMEOUT_MS });
      if (result.missing) return 'npm is not installed or not in PATH';
      if (result.timedOut) return `Package ${input.operation} timed out`;

      return formatProcessOutput(result) || `Package ${input.operation} completed`;
    },
  );
}

export function createTestRunnerTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'run_tests',
      description: 'Run tests with npm, vitest, jest or pytest',
      parameters: {
        test_path: { type: 'string', required: false, default: '.', description: 'Path to a test file or directory' },
        test_runner: { type: 'string', required: false, default: 'npm', description: "Test runner: 'npm', 'vitest', 'jest', 'pytest'" },
        verbose: { type: 'boolean', required: false, default: true, description: 'Verbose output' },
      },
    },
    TestInputSchema,
    async input => {
      const plan = buildTestCommand(input);
      if (!plan.ok) return plan.message;

      const result = await runFile(plan.file, plan.args, { cwd: environment.cwd, timeoutMs: TEST_TIMEOUT_MS });
      if (result.missing) return `${input.test_runner} is not installed or not in PATH`;
      if (result.timedOut) return 'Test execution timed out';

      let output = result.stdout;
      if (result.stderr) {
        output += `\nSTDERR:\n${result.stderr}`;
      }
      output += result.exitCode === 0
        ? '\nAll tests passed!'
        : `\nTests failed (exit code: ${result.exitCode})`;
      return output;
    },
  );
}

/**
 * All development tools.
 */
export function createDevelopmentTools(environment: ToolEnvironment = {}): Tool[] {
  return [
    createGitTool(environment),
    createPackageTool(environment),
    createTestRunnerTool(environment),
  ];
}
