/**
 * @fileoverview Unit tests for configuration loading
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  CONFIG_FILENAME,
  deepMerge,
  envLayer,
  getConfigValue,
  loadConfig,
  parseConfig,
  redactConfig,
} from './config.js';
import { ConfigError } from '../types/errors.js';
import { Severity } from '../types/core.types.js';
import { ModelProvider } from '../providers/base.js';

describe('parseConfig()', () => {
  it('should fill every section with defaults', () => {
    const config = parseConfig({});

    expect(config.agent).toEqual({
      maxSteps: 15,
      verbose: false,
      stepDelayMs: 500,
      memoryWindow: 3,
      resultLimit: 500,
      promptResultLimit: 200,
    });
    expect(config.model).toEqual({
      provider: ModelProvider.MOCK,
      temperature: 0.7,
      maxTokens: 1000,
      timeoutMs: 30000,
    });
    expect(config.tools.enabledCategories).toEqual(['System', 'Files', 'Web', 'Development']);
    expect(config.memory).toEqual({ capacity: 50, autoSave: false, saveFile: 'taskpilot-memory.json' });
    expect(config.output.logLevel).toBe(Severity.INFO);
  });

  it('should accept lower-case log levels', () => {
    expect(parseConfig({ output: { logLevel: 'debug' } }).output.logLevel).toBe(Severity.DEBUG);
    expect(parseConfig({ output: { logLevel: ' Warn ' } }).output.logLevel).toBe(Severity.WARN);
  });

  it('should list every issue with its path', () => {
    const error = (() => {
      try {
        parseConfig({ agent: { maxSteps: 0 }, model: { provider: 'oracle' } }, 'test.json');
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError ? error.issues.map(i => i.split(':')[0]) : []).toEqual([
      'agent.maxSteps',
      'model.provider',
    ]);
    expect(error instanceof ConfigError ? error.message : '').toMatch(/^Invalid configuration \(test\.json\): /);
  });
});

describe('deepMerge()', () => {
  it('should merge nested objects and replace arrays', () => {
    const merged = deepMerge(
      { agent: { maxSteps: 15, verbose: false }, tools: { disabledTools: ['a'] } },
      { agent: { maxSteps: 3, verbose: undefined }, tools: { disabledTools: ['b'] } },
    );

    expect(merged).toEqual({ agent: { maxSteps: 3, verbose: false }, tools: { disabledTools: ['b'] } });
  });
});

describe('envLayer()', () => {
  it('should map the known variables', () => {
    expect(envLayer({
      TASKPILOT_PROVIDER: 'OpenAI',
      TASKPILOT_MODEL: 'test-model',
      TASKPILOT_MAX_STEPS: '7',
      TASKPILOT_LOG_LEVEL: 'warn',
      UNRELATED: 'x',
    })).toEqual({
      agent: { maxSteps: 7 },
      model: { provider: 'openai', model: 'test-model' },
      output: { logLevel: 'warn' },
    });
  });

  it('should ignore blank values', () => {
    expect(envLayer({ TASKPILOT_MODEL: '  ' })).toEqual({});
  });
});

describe('loadConfig()', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskpilot-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should use defaults when the home file does not exist', async () => {
    const config = await loadConfig({ env: {}, homedir: () => dir });
    expect(config.agent.maxSteps).toBe(15);
  });

  it('should layer file, environment and overrides', async () => {
    await writeFile(join(dir, CONFIG_FILENAME), JSON.stringify({
      agent: { maxSteps: 20, verbose: true },
      model: { provider: 'openai', temperature: 0.2 },
    }));

    const config = await loadConfig({
      env: { TASKPILOT_MAX_STEPS: '9' },
      overrides: { agent: { maxSteps: 4 } },
      homedir: () => dir,
    });

    expect(config.agent.maxSteps).toBe(4);
    expect(config.agent.verbose).toBe(true);
    expect(config.model.provider).toBe(ModelProvider.OPENAI);
    expect(config.model.temperature).toBe(0.2);
  });

  it('should resolve the API key of the chosen provider', async () => {
    const env = { OPENAI_API_KEY: 'test-secret', ANTHROPIC_API_KEY: 'other-secret' };

    const openai = await loadConfig({ env, homedir: () => dir, overrides: { model: { provider: 'openai' } } });
    const anthropic = await loadConfig({ env, homedir: () => dir, overrides: { model: { provider: 'anthropic' } } });
    const mock = await loadConfig({ env, homedir: () => dir });

    expect(openai.model.apiKey).toBe('test-secret');
    expect(anthropic.model.apiKey).toBe('other-secret');
    expect(mock.model.apiKey).toBeUndefined();
  });

  it('should keep an API key set in the file', async () => {
    const path = join(dir, 'custom.json');
    await writeFile(path, JSON.stringify({ model: { provider: 'openai', apiKey: 'file-secret' } }));

    const config = await loadConfig({ configPath: path, env: { OPENAI_API_KEY: 'test-secret' } });

    expect(config.model.apiKey).toBe('file-secret');
  });

  it('should reject a missing explicit file', async () => {
    await expect(loadConfig({ configPath: join(dir, 'nope.json'), env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should reject a file that is not JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ agent: ');

    await expect(loadConfig({ configPath: path, env: {} })).rejects.toThrow(/not valid JSON/);
  });

  it('should reject a file holding an array', async () => {
    const path = join(dir, 'array.json');
    await writeFile(path, '[]');

    await expect(loadConfig({ configPath: path, env: {} })).rejects.toThrow('expected a JSON object');
  });

  it('should reject an invalid environment value', async () => {
    await expect(loadConfig({ env: { TASKPILOT_MAX_STEPS: 'lots' }, homedir: () => dir }))
      .rejects.toBeInstanceOf(ConfigError);
  });
});

describe('helpers', () => {
  it('should read values by dot path', () => {
    const config = parseConfig({});

    expect(getConfigValue(config, 'agent.maxSteps')).toBe(15);
    expect(getConfigValue(config, 'memory')).toEqual(config.memory);
    expect(getConfigValue(config, 'agent.unknown.deeper')).toBeUndefined();
  });

  it('should mask the API key for display', () => {
    const config = parseConfig({ model: { apiKey: 'test-secret' } });

    expect(redactConfig(config).model.apiKey).toBe('***');
    expect(config.model.apiKey).toBe('test-secret');
  });
});
