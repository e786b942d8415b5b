/**
 * @fileoverview CLI command implementations.
 *
 * Everything the executable does, minus process wiring: output goes
 * through {@link CliIO} and interruption arrives as an `AbortSignal`.
 *
 * @module taskpilot/cli/commands
 */

import { AgentLoop, type RunResult } from '../agent/agent-loop.js';
import { loadConfig, redactConfig, type AppConfig, type ConfigLayer } from '../config/config.js';
import { MemoryStore } from '../memory/memory-store.js';
import { ConsoleTransport, Logger, type LogTransport } from '../observability/logger.js';
import { createModel, type ModelInterface } from '../providers/index.js';
import { ToolRegistry } from '../registry/tool-registry.js';
import { groupByCategory } from '../registry/tool-categories.js';
import { registerDefaultTools } from '../tools/index.js';
import { AgentPhase, Severity } from '../types/core.types.js';
import { ConfigError, UsageError, errorMessage } from '../types/errors.js';
import { parseArgs, type CliOptions } from './args.js';

export const VERSION = '0.1.0';

/** Exit status for a run stopped by the operator. */
export const EXIT_INTERRUPTED = 130;
export const EXIT_USAGE = 2;

/**
 * Where command output goes.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Process-level inputs, injectable for tests.
 */
export interface CliRuntime {
  readonly signal?: AbortSignal;
  readonly env?: NodeJS.ProcessEnv;
  readonly homedir?: () => string;
  readonly cwd?: string;
  /** Replaces the configured provider */
  readonly model?: ModelInterface;
  /** Replaces the console transport */
  readonly transports?: LogTransport[];
}

/**
 * Runs the command line and returns the exit status.
 */
export async function main(argv: ReadonlyArray<string>, io: CliIO = consoleIO, runtime: CliRuntime = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.err(`Error: ${error.message}`);
      io.err("Run 'taskpilot help' for usage.");
      return EXIT_USAGE;
    }
    throw error;
  }

  const { command } = options;
  switch (command) {
    case 'help':
      io.out(helpText());
      return 0;

    case 'version':
      io.out(`taskpilot v${VERSION}`);
      return 0;

    default:
      break;
  }

  let config: AppConfig;
  try {
    config = await loadConfig({
      configPath: options.configPath,
      env: runtime.env,
      homedir: runtime.homedir,
      overrides: configOverrides(options),
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      io.err(`Error: ${error.message}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  switch (command) {
    case 'tools':
      listTools(config, io, runtime);
      return 0;

    case 'tool-help':
      return toolHelp(options.subject ?? '', config, io, runtime);

    case 'config':
      io.out(JSON.stringify(redactConfig(config), null, 2));
      return 0;

    case 'run':
      return runObjective(options.subject ?? '', options, config, io, runtime);
  }
}

/**
 * Configuration layer built from command line flags.
 */
export function configOverrides(options: CliOptions): ConfigLayer {
  return {
    agent: {
      maxSteps: options.maxSteps,
      verbose: options.verbose ? true : undefined,
    },
    model: {
      provider: options.provider,
      model: options.model,
    },
  };
}

/**
 * Registry holding the built-in tools the configuration enables.
 */
export function buildRegistry(config: AppConfig, cwd?: string): ToolRegistry {
  const registry = new ToolRegistry({ timeoutMs: config.tools.timeoutMs });
  return registerDefaultTools(registry, config.tools, { cwd });
}

/**
 * Human-readable lines describing a finished run.
 */
export function formatRunResult(result: RunResult): string[] {
  const lines = [
    `Status: ${result.status}`,
    `Steps: ${result.summary.stepsCompleted}/${result.summary.maxSteps}`,
    `Tools used: ${result.summary.toolsUsed}`,
    `Memory items: ${result.summary.memoryItems}`,
  ];
  if (result.errors.length > 0) {
    lines.push(`Errors: ${result.errors.length}`);
    for (const error of result.errors) {
      lines.push(`  - step ${error.stepIndex}: ${error.message}`);
    }
  }
  lines.push(`Duration: ${result.durationMs}ms`);
  return lines;
}

// ============ Commands ============

async function runObjective(
  objective: string,
  options: CliOptions,
  config: AppConfig,
  io: CliIO,
  runtime: CliRuntime,
): Promise<number> {
  const logger = new Logger({
    module: 'cli',
    minLevel: config.agent.verbose ? Severity.DEBUG : config.output.logLevel,
    transports: runtime.transports ?? [new ConsoleTransport()],
  });

  const memory = new MemoryStore({ capacity: config.memory.capacity });
  if (options.loadMemory !== undefined) {
    try {
      await memory.loadFromFile(options.loadMemory);
    } catch (error) {
      io.err(`Error: could not load memory from ${options.loadMemory}: ${errorMessage(error)}`);
      return 1;
    }
    logger.info('Memory loaded', { path: options.loadMemory, steps: memory.all().length });
  }

  const loop = new AgentLoop(
    {
      model: runtime.model ?? createModel(config.model),
      registry: buildRegistry(config, runtime.cwd),
      memory,
      logger,
    },
    {
      maxSteps: config.agent.maxSteps,
      memoryWindow: config.agent.memoryWindow,
      resultLimit: config.agent.resultLimit,
      promptResultLimit: config.agent.promptResultLimit,
      stepDelayMs: config.agent.stepDelayMs,
      context: { currentDirectory: runtime.cwd ?? process.cwd() },
    },
  );

  const result = await loop.run(objective, { signal: runtime.signal });
  for (const line of formatRunResult(result)) {
    io.out(line);
  }

  const savePath = options.saveMemory ?? (config.memory.autoSave ? config.memory.saveFile : undefined);
  if (savePath !== undefined) {
    try {
      await memory.saveToFile(savePath);
      io.out(`Memory saved to ${savePath}`);
    } catch (error) {
      io.err(`Error: could not save memory to ${savePath}: ${errorMessage(error)}`);
      return 1;
    }
  }

  if (result.status === AgentPhase.INTERRUPTED) return EXIT_INTERRUPTED;
  return result.summary.success ? 0 : 1;
}

function listTools(config: AppConfig, io: CliIO, runtime: CliRuntime): void {
  const registry = buildRegistry(config, runtime.cwd);
  const descriptors = registry.describeAll();

  io.out(`Available tools (${registry.size}):`);
  for (const group of groupByCategory(registry.names())) {
    io.out('');
    io.out(`${group.category}:`);
    for (const name of group.tools) {
      io.out(`  ${name} - ${descriptors.get(name)?.description ?? ''}`);
    }
  }
}

function toolHelp(name: string, config: AppConfig, io: CliIO, runtime: CliRuntime): number {
  const registry = buildRegistry(config, runtime.cwd);
  if (!registry.has(name)) {
    io.err(`Tool '${name}' not found. Available tools: ${registry.names().join(', ')}`);
    return 1;
  }
  io.out(registry.getToolHelp(name));
  return 0;
}

function helpText(): string {
  return `taskpilot v${VERSION}
Drive a language model toward an objective, one tool call at a time.

USAGE:
  taskpilot <command> [options]

COMMANDS:
  run "<objective>"     Run the agent until it finishes or hits the step limit
  tools                 List available tools by category
  tool-help <name>      Show parameters for one tool
  config                Print the effective configuration
  help                  Show this help message
  version               Show version

OPTIONS:
  --max-steps <n>       Maximum number of steps (default: 15)
  --provider <name>     Model provider: mock, openai, anthropic
  --model <id>          Provider model id
  --config <path>       Configuration file (default: ~/.taskpilot.json)
  --verbose             Log every step at debug level
  --save-memory <file>  Write the run's memory to a JSON file
  --load-memory <file>  Continue from a saved memory file

ENVIRONMENT:
  TASKPILOT_PROVIDER, TASKPILOT_MODEL, TASKPILOT_MAX_STEPS, TASKPILOT_LOG_LEVEL
  OPENAI_API_KEY, ANTHROPIC_API_KEY

Press Ctrl+C during a run to stop after the current step.`;
}
