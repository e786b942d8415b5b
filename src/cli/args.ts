/**
 * @fileoverview Command line parsing.
 *
 * @module taskpilot/cli/args
 */

import { UsageError } from '../types/errors.js';

export type CliCommand = 'run' | 'tools' | 'tool-help' | 'config' | 'help' | 'version';

const COMMANDS: ReadonlyArray<CliCommand> = ['run', 'tools', 'tool-help', 'config', 'help', 'version'];

/**
 * Parsed command line.
 */
export interface CliOptions {
  command: CliCommand;
  /** Objective for `run`, tool name for `tool-help` */
  subject: string | undefined;
  configPath: string | undefined;
  maxSteps: number | undefined;
  provider: string | undefined;
  model: string | undefined;
  verbose: boolean;
  saveMemory: string | undefined;
  loadMemory: string | undefined;
}

/**
 * Parse command line arguments. With no arguments the command is `help`.
 *
 * @throws UsageError for unknown commands or options, missing option
 *   values and a missing objective or tool name
 */
export function parseArgs(args: ReadonlyArray<string>): CliOptions {
  const options: CliOptions = {
    command: 'help',
    subject: undefined,
    configPath: undefined,
    maxSteps: undefined,
    provider: undefined,
    model: undefined,
    verbose: false,
    saveMemory: undefined,
    loadMemory: undefined,
  };

  let commandSeen = false;
  const positionals: string[] = [];

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`Option ${flag} requires a value`);
    }
    return value;
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        options.command = 'help';
        commandSeen = true;
        break;

      case '--version':
        options.command = 'version';
        commandSeen = true;
        break;

      case '--verbose':
        options.verbose = true;
        break;

      case '--max-steps': {
        const raw = valueOf(arg, ++i);
        const value = Number(raw);
        if (!Number.isInteger(value) || value < 1) {
          throw new UsageError(`--max-steps expects a positive integer, got '${raw}'`);
        }
        options.maxSteps = value;
        break;
      }

      case '--provider':
        options.provider = valueOf(arg, ++i).toLowerCase();
        break;

      case '--model':
        options.model = valueOf(arg, ++i);
        break;

      case '--config':
        options.configPath = valueOf(arg, ++i);
        break;

      case '--save-memory':
        options.saveMemory = valueOf(arg, ++i);
        break;

      case '--load-memory':
        options.loadMemory = valueOf(arg, ++i);
        break;

      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        if (!commandSeen) {
          options.command = toCommand(arg);
          commandSeen = true;
        } else {
          positionals.push(arg);
        }
    }

    i++;
  }

  if (positionals.length > 0) {
    options.subject = positionals.join(' ');
  }

  if (options.command === 'run' && !options.subject?.trim()) {
    throw new UsageError('An objective is required: taskpilot run "<objective>"');
  }
  if (options.command === 'tool-help' && !options.subject) {
    throw new UsageError('A tool name is required: taskpilot tool-help <name>');
  }

  return options;
}

function toCommand(word: string): CliCommand {
  const command = COMMANDS.find(candidate => candidate === word);
  if (command === undefined) {
    throw new UsageError(`Unknown command: ${word}`);
  }
  return command;
}
