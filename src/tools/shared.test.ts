/**
 * @fileoverview Unit tests for the shared tool helpers
 */

import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { defineTool, formatProcessOutput, runFile, runShell } from './shared.js';

describe('defineTool()', () => {
  it('should hand parsed input to the handler and report schema failures', async () => {
    const echo = defineTool(
      { name: 'echo', description: 'Echo a word', parameters: {} },
      z.object({ word: z.string(), times: z.number().default(1) }),
      async ({ word, times }) => word.repeat(times),
    );

    expect(await echo.execute({ word: 'ab', times: 2 })).toBe('abab');
    expect(await echo.execute({ word: 3 })).toBe('Invalid arguments for echo: word: Expected string, received number');
  });
});

describe('runShell()', () => {
  it('should capture both streams and the exit code', async () => {
    const result = await runShell('echo out; echo err >&2; exit 4', { timeoutMs: 5000 });

    expect(result).toEqual({ stdout: 'out\n', stderr: 'err\n', exitCode: 4, timedOut: false, missing: false });
  });

  it('should flag a command killed by its timeout', async () => {
    const result = await runShell('sleep 3', { timeoutMs: 200 });

    expect(result.timedOut).toBe(true);
  });
});

describe('runFile()', () => {
  it('should flag an executable that does not exist', async () => {
    const result = await runFile('taskpilot-no-such-binary', [], { timeoutMs: 1000 });

    expect(result.missing).toBe(true);
    expect(result.exitCode).toBe(1);
  });

  it('should pass arguments without a shell', async () => {
    const result = await runFile('echo', ['$HOME', 'a b'], { timeoutMs: 1000 });

    expect(result.stdout).toBe('$HOME a b\n');
  });
});

describe('formatProcessOutput()', () => {
  it('should add stderr and the exit code only when present', () => {
    const base = { stdout: 'done\n', stderr: '', exitCode: 0, timedOut: false, missing: false };

    expect(formatProcessOutput(base)).toBe('done\n');
    expect(formatProcessOutput({ ...base, stderr: 'warn\n', exitCode: 2 })).toBe('done\n\nSTDERR:\nwarn\n\nReturn code: 2');
  });
});
