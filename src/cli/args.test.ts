/**
 * @fileoverview Unit tests for command line parsing
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from './args.js';
import { UsageError } from '../types/errors.js';

describe('parseArgs()', () => {
  it('should default to help', () => {
    expect(parseArgs([]).command).toBe('help');
  });

  it('should parse a run with every option', () => {
    const options = parseArgs([
      'run', 'List', 'the', 'files',
      '--max-steps', '5',
      '--provider', 'OpenAI',
      '--model', 'test-model',
      '--config', 'cfg.json',
      '--verbose',
      '--save-memory', 'out.json',
      '--load-memory', 'in.json',
    ]);

    expect(options).toEqual({
      command: 'run',
      subject: 'List the files',
      configPath: 'cfg.json',
      maxSteps: 5,
      provider: 'openai',
      model: 'test-model',
      verbose: true,
      saveMemory: 'out.json',
      loadMemory: 'in.json',
    });
  });

  it('should take the tool name for tool-help', () => {
    expect(parseArgs(['tool-help', 'read_file']).subject).toBe('read_file');
  });

  it('should accept --help and --version anywhere', () => {
    expect(parseArgs(['--version']).command).toBe('version');
    expect(parseArgs(['--help', 'run']).command).toBe('help');
  });

  it('should reject malformed command lines', () => {
    expect(() => parseArgs(['launch'])).toThrow(new UsageError('Unknown command: launch'));
    expect(() => parseArgs(['tools', '--colour'])).toThrow('Unknown option: --colour');
    expect(() => parseArgs(['run', 'x', '--model'])).toThrow('Option --model requires a value');
    expect(() => parseArgs(['run', 'x', '--max-steps', '0'])).toThrow("--max-steps expects a positive integer, got '0'");
    expect(() => parseArgs(['run'])).toThrow('An objective is required: taskpilot run "<objective>"');
    expect(() => parseArgs(['tool-help'])).toThrow('A tool name is required: taskpilot tool-help <name>');
  });
});
