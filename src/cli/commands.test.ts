/**
 * @fileoverview Unit tests for the CLI commands
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { EXIT_INTERRUPTED, EXIT_USAGE, VERSION, main, type CliIO, type CliRuntime } from './commands.js';
import { CONFIG_FILENAME } from '../config/config.js';
import { MockModel } from '../providers/mock.js';
import { MemoryTransport } from '../observability/logger.js';

describe('CLI', () => {
  let dir: string;
  let out: string[];
  let err: string[];
  let io: CliIO;
  let runtime: CliRuntime;

  const writeConfig = (config: Record<string, unknown>): Promise<void> =>
    writeFile(join(dir, CONFIG_FILENAME), JSON.stringify(config));

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'taskpilot-cli-'));
    out = [];
    err = [];
    io = { out: line => out.push(line), err: line => err.push(line) };
    runtime = { env: {}, homedir: () => dir, cwd: dir, transports: [new MemoryTransport()] };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should print the version', async () => {
    expect(await main(['version'], io, runtime)).toBe(0);
    expect(out).toEqual([`taskpilot v${VERSION}`]);
  });

  it('should print help', async () => {
    expect(await main([], io, runtime)).toBe(0);
    expect(out[0]?.split('\n')[0]).toBe(`taskpilot v${VERSION}`);
  });

  it('should report usage errors', async () => {
    expect(await main(['--bogus'], io, runtime)).toBe(EXIT_USAGE);
    expect(err).toEqual(['Error: Unknown option: --bogus', "Run 'taskpilot help' for usage."]);
  });

  it('should report configuration errors', async () => {
    expect(await main(['tools', '--config', join(dir, 'missing.json')], io, runtime)).toBe(EXIT_USAGE);
    expect(err[0]).toMatch(/^Error: Invalid configuration \(.*missing\.json\): cannot read file: /);
  });

  describe('tools', () => {
    beforeEach(async () => {
      await writeConfig({ tools: { enabledCategories: ['Web'] } });
    });

    it('should list the enabled tools by category', async () => {
      expect(await main(['tools'], io, runtime)).toBe(0);
      expect(out).toEqual([
        'Available tools (4):',
        '',
        'Web:',
        '  api_request - Make HTTP API requests (GET, POST, PUT, PATCH, DELETE)',
        '  download_file - Download a file from a URL',
        '  search_web - Search the web using DuckDuckGo',
        '  scrape_web - Scrape content from a web page',
      ]);
    });

    it('should show help for one tool', async () => {
      expect(await main(['tool-help', 'download_file'], io, runtime)).toBe(0);
      expect(out[0]?.split('\n').slice(0, 3)).toEqual(['download_file', '', 'Description: Download a file from a URL']);
    });

    it('should reject a tool that is not enabled', async () => {
      expect(await main(['tool-help', 'read_file'], io, runtime)).toBe(1);
      expect(err).toEqual(["Tool 'read_file' not found. Available tools: api_request, download_file, search_web, scrape_web"]);
    });
  });

  it('should print the configuration with the API key masked', async () => {
    const code = await main(['config', '--provider', 'openai'], io, { ...runtime, env: { OPENAI_API_KEY: 'test-secret' } });

    expect(code).toBe(0);
    const printed: unknown = JSON.parse(out.join('\n'));
    expect(printed).toMatchObject({ model: { provider: 'openai', apiKey: '***' } });
  });

  describe('run', () => {
    beforeEach(async () => {
      await writeConfig({ agent: { stepDelayMs: 0 } });
    });

    it('should run to completion and save memory', async () => {
      const model = new MockModel(['{"thought": "look around", "action": "list_directory", "args": {}}']);
      const memoryFile = join(dir, 'memory.json');

      const code = await main(['run', 'Inspect', 'the', 'folder', '--save-memory', memoryFile], io, { ...runtime, model });

      expect(code).toBe(0);
      expect(out.slice(0, 4)).toEqual(['Status: TERMINATED', 'Steps: 2/15', 'Tools used: 1', 'Memory items: 1']);
      expect(out.at(-1)).toBe(`Memory saved to ${memoryFile}`);
      expect(model.prompts[0]).toContain('Inspect the folder');

      const saved: unknown = JSON.parse(await readFile(memoryFile, 'utf-8'));
      expect(saved).toMatchObject({ steps: [{ step: 1, action: 'list_directory' }], tools_usage: { list_directory: 1 } });
    });

    it('should continue from a loaded memory file', async () => {
      const memoryFile = join(dir, 'memory.json');
      await main(['run', 'first', '--save-memory', memoryFile], io, {
        ...runtime,
        model: new MockModel(['{"thought": "t", "action": "list_directory", "args": {}}']),
      });

      const model = new MockModel();
      out = [];
      const code = await main(['run', 'second', '--load-memory', memoryFile], io, { ...runtime, model });

      expect(code).toBe(0);
      expect(out[3]).toBe('Memory items: 1');
      expect(model.prompts[0]).toContain('Step 1: list_directory - t');
    });

    it('should fail when the memory file cannot be loaded', async () => {
      const code = await main(['run', 'x', '--load-memory', join(dir, 'none.json')], io, runtime);

      expect(code).toBe(1);
      expect(err[0]).toMatch(/^Error: could not load memory from .*none\.json: /);
    });

    it('should exit with the interrupt status when aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const code = await main(['run', 'x'], io, { ...runtime, model: new MockModel(), signal: controller.signal });

      expect(code).toBe(EXIT_INTERRUPTED);
      expect(out[0]).toBe('Status: INTERRUPTED');
    });
  });
});
