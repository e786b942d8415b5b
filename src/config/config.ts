/**
 * @fileoverview Configuration loading.
 *
 * Layers, lowest precedence first:
 * 1. schema defaults
 * 2. JSON file (`~/.taskpilot.json`, or an explicit path)
 * 3. environment variables
 * 4. overrides from the command line
 *
 * The merged object is validated once with zod. The API key is resolved
 * last from the provider-specific variable, so that a provider chosen on
 * the command line still finds its key.
 *
 * @module taskpilot/config
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { Severity, isPlainObject } from '../types/core.types.js';
import { ConfigError, errorMessage } from '../types/errors.js';
import { ModelProvider } from '../providers/base.js';
import { parseSeverity } from '../observability/logger.js';
import { ToolCategory } from '../registry/tool-categories.js';

export const CONFIG_FILENAME = '.taskpilot.json';

const API_KEY_ENV: Readonly<Record<ModelProvider, string | null>> = {
  [ModelProvider.MOCK]: null,
  [ModelProvider.OPENAI]: 'OPENAI_API_KEY',
  [ModelProvider.ANTHROPIC]: 'ANTHROPIC_API_KEY',
};

const AgentSectionSchema = z.object({
  maxSteps: z.number().int().positive().default(15),
  verbose: z.boolean().default(false),
  stepDelayMs: z.number().int().nonnegative().default(500),
  memoryWindow: z.number().int().nonnegative().default(3),
  resultLimit: z.number().int().positive().default(500),
  promptResultLimit: z.number().int().positive().default(200),
});

const ModelSectionSchema = z.object({
  provider: z.nativeEnum(ModelProvider).default(ModelProvider.MOCK),
  model: z.string().min(1).optional(),
  apiKey: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().default(1000),
  timeoutMs: z.number().int().positive().default(30_000),
});

const ToolsSectionSchema = z.object({
  disabledTools: z.array(z.string()).default([]),
  enabledCategories: z.array(z.nativeEnum(ToolCategory)).default(Object.values(ToolCategory)),
  timeoutMs: z.number().int().positive().optional(),
});

const MemorySectionSchema = z.object({
  capacity: z.number().int().positive().default(50),
  autoSave: z.boolean().default(false),
  saveFile: z.string().min(1).default('taskpilot-memory.json'),
});

const OutputSectionSchema = z.object({
  logLevel: z
    .preprocess(value => (typeof value === 'string' ? parseSeverity(value) ?? value : value), z.nativeEnum(Severity))
    .default(Severity.INFO),
});

export const AppConfigSchema = z.object({
  agent: AgentSectionSchema.default({}),
  model: ModelSectionSchema.default({}),
  tools: ToolsSectionSchema.default({}),
  memory: MemorySectionSchema.default({}),
  output: OutputSectionSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * A partial configuration layer, as found in a file or built from flags.
 */
export type ConfigLayer = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit file; a missing explicit file is an error */
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: ConfigLayer;
  readonly homedir?: () => string;
}

/**
 * Loads, merges and validates the configuration.
 *
 * @throws ConfigError if the file is unreadable or invalid, or the merged
 *   result fails validation
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const env = options.env ?? process.env;
  const fileLayer = await readConfigFile(options);

  const merged = [fileLayer, envLayer(env), options.overrides ?? {}]
    .reduce<ConfigLayer>((acc, layer) => deepMerge(acc, layer), {});

  const config = parseConfig(merged, options.configPath);
  return withApiKey(config, env);
}

/**
 * Validates a raw configuration object, filling in defaults.
 *
 * @throws ConfigError listing every issue
 */
export function parseConfig(raw: unknown, source?: string): AppConfig {
  const result = AppConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      source,
    );
  }
  return result.data;
}

/**
 * Configuration values taken from the environment.
 *
 * - `TASKPILOT_PROVIDER` → `model.provider`
 * - `TASKPILOT_MODEL` → `model.model`
 * - `TASKPILOT_MAX_STEPS` → `agent.maxSteps`
 * - `TASKPILOT_LOG_LEVEL` → `output.logLevel`
 */
export function envLayer(env: NodeJS.ProcessEnv): ConfigLayer {
  const agent: ConfigLayer = {};
  const model: ConfigLayer = {};
  const output: ConfigLayer = {};

  const provider = env['TASKPILOT_PROVIDER']?.trim();
  if (provider) model['provider'] = provider.toLowerCase();

  const modelName = env['TASKPILOT_MODEL']?.trim();
  if (modelName) model['model'] = modelName;

  const maxSteps = env['TASKPILOT_MAX_STEPS']?.trim();
  if (maxSteps) agent['maxSteps'] = Number(maxSteps);

  const logLevel = env['TASKPILOT_LOG_LEVEL']?.trim();
  if (logLevel) output['logLevel'] = logLevel;

  const layer: ConfigLayer = {};
  if (Object.keys(agent).length > 0) layer['agent'] = agent;
  if (Object.keys(model).length > 0) layer['model'] = model;
  if (Object.keys(output).length > 0) layer['output'] = output;
  return layer;
}

/**
 * Recursively merges plain objects. Arrays and scalars from `source`
 * replace those in `target`; `undefined` values are skipped.
 */
export function deepMerge(target: ConfigLayer, source: ConfigLayer): ConfigLayer {
  const result: ConfigLayer = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    result[key] = isPlainObject(existing) && isPlainObject(value)
      ? deepMerge(existing, value)
      : value;
  }

  return result;
}

/**
 * Reads a value by dot path, e.g. `agent.maxSteps`.
 *
 * @returns The value, or `undefined` when any segment is missing
 */
export function getConfigValue(config: AppConfig, path: string): unknown {
  let current: unknown = config;
  for (const key of path.split('.')) {
    if (!isPlainObject(current) || !(key in current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Copy safe for display: the API key is masked.
 */
export function redactConfig(config: AppConfig): AppConfig {
  if (config.model.apiKey === undefined) {
    return config;
  }
  return { ...config, model: { ...config.model, apiKey: '***' } };
}

// ============ Private Helpers ============

async function readConfigFile(options: LoadConfigOptions): Promise<ConfigLayer> {
  const explicit = options.configPath !== undefined;
  const path = options.configPath ?? join((options.homedir ?? homedir)(), CONFIG_FILENAME);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (!explicit && isNotFound(error)) {
      return {};
    }
    throw new ConfigError([`cannot read file: ${errorMessage(error)}`], path);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError([`not valid JSON: ${errorMessage(error)}`], path);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(['expected a JSON object'], path);
  }
  return parsed;
}

function withApiKey(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  if (config.model.apiKey !== undefined) {
    return config;
  }

  const envName = API_KEY_ENV[config.model.provider];
  const apiKey = envName !== null ? env[envName]?.trim() : undefined;
  if (!apiKey) {
    return config;
  }
  return { ...config, model: { ...config.model, apiKey } };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
