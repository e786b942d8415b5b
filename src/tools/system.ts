/**
 * @fileoverview System tools: shell commands, host information, processes
 * and environment variables.
 *
 * Commands run unsandboxed with the permissions of the current process.
 *
 * @module taskpilot/tools/system
 */

import * as os from 'node:os';
import { statfs } from 'node:fs/promises';
import { z } from 'zod';
import type { Tool } from '../types/tools.types.js';
import { errorMessage } from '../types/errors.js';
import { defineTool, runFile, runShell, type ToolEnvironment } from './shared.js';

/** Characters of command output returned to the model. */
export const COMMAND_OUTPUT_LIMIT = 2000;

/** Variables shown by `manage_environment` with action `list`. */
export const ENV_LIST_LIMIT = 20;

const ENV_VALUE_LIMIT = 50;

/** Processes shown by `manage_process` with action `list`. */
export const PROCESS_LIST_LIMIT = 10;

const PS_TIMEOUT_MS = 10_000;
const PS_COLUMNS = 'pid=,ppid=,stat=,pcpu=,pmem=,comm=';
const PS_LINE = /^\s*(\d+)\s+(\d+)\s+(\S+)\s+([\d.]+)\s+([\d.]+)\s+(.+)$/;

export interface ProcessEntry {
  readonly pid: number;
  readonly ppid: number;
  readonly status: string;
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly name: string;
}

// ============ Input Schemas ============

const RunCommandInputSchema = z.object({
  cmd: z.string().min(1),
  timeout: z.number().int().positive().default(30),
  capture_stderr: z.boolean().default(true),
});

const SystemInfoInputSchema = z.object({
  info_type: z.enum(['basic', 'cpu', 'memory', 'disk', 'all']).default('basic'),
});

const ProcessInputSchema = z.object({
  action: z.enum(['list', 'kill', 'info']),
  process_name: z.string().min(1).optional(),
  pid: z.number().int().positive().optional(),
});

const EnvironmentInputSchema = z.object({
  action: z.enum(['get', 'set', 'list', 'unset']),
  variable: z.string().optional(),
  value: z.string().default(''),
});

// ============ Tool Implementations ============

export function createRunCommandTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'run_command',
      description: 'Execute a shell command and return the output',
      parameters: {
        cmd: { type: 'string', required: true, description: 'Shell command to execute' },
        timeout: { type: 'integer', required: false, default: 30, description: 'Timeout in seconds' },
        capture_stderr: { type: 'boolean', required: false, default: true, description: 'Include stderr in the output' },
      },
    },
    RunCommandInputSchema,
    async input => {
      const result = await runShell(input.cmd, {
        cwd: environment.cwd,
        timeoutMs: input.timeout * 1000,
      });

      if (result.timedOut) {
        return `Command timed out after ${input.timeout} seconds`;
      }

      let output = result.stdout;
      if (input.capture_stderr && result.stderr) {
        output += `\nSTDERR:\n${result.stderr}`;
      }
      if (result.exitCode !== 0) {
        output += `\nReturn code: ${result.exitCode}`;
      }

      if (output.length > COMMAND_OUTPUT_LIMIT) {
        output = `${output.slice(0, COMMAND_OUTPUT_LIMIT)}\n... (output truncated)`;
      }
      return output || 'Command completed with no output';
    },
  );
}

export function createSystemInfoTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'get_system_info',
      description: 'Get information about the host system',
      parameters: {
        info_type: {
          type: 'string',
          required: false,
          default: 'basic',
          description: "Type of info: 'basic', 'cpu', 'memory', 'disk', 'all'",
        },
      },
    },
    SystemInfoInputSchema,
    async ({ info_type: infoType }) => {
      const info: Array<[string, string | number]> = [];
      const wants = (section: string): boolean => infoType === section || infoType === 'all';

      if (wants('basic')) {
        info.push(
          ['Platform', `${os.type()} ${os.release()} (${os.arch()})`],
          ['System', os.platform()],
          ['Processor', os.cpus()[0]?.model ?? 'unknown'],
          ['Node Version', process.version],
          ['Current Directory', environment.cwd ?? process.cwd()],
          ['User', (environment.env ?? process.env)['USER'] ?? 'unknown'],
        );
      }

      if (wants('cpu')) {
        info.push(
          ['Cpu Count', os.cpus().length],
          ['Load Average', os.loadavg().map(load => load.toFixed(2)).join(', ')],
        );
      }

      if (wants('memory')) {
        const total = os.totalmem();
        const free = os.freemem();
        info.push(
          ['Memory Total', formatGigabytes(total)],
          ['Memory Available', formatGigabytes(free)],
          ['Memory Percent', `${(((total - free) / total) * 100).toFixed(1)}%`],
        );
      }

      if (wants('disk')) {
        try {
          const stats = await statfs('/');
          const total = stats.blocks * stats.bsize;
          const free = stats.bavail * stats.bsize;
          info.push(
            ['Disk Total', formatGigabytes(total)],
            ['Disk Free', formatGigabytes(free)],
            ['Disk Percent', `${total > 0 ? (((total - free) / total) * 100).toFixed(1) : '0.0'}%`],
          );
        } catch (error) {
          info.push(['Disk', `unavailable (${errorMessage(error)})`]);
        }
      }

      return info.map(([key, value]) => `${key}: ${value}`).join('\n');
    },
  );
}

export function createProcessTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'manage_process',
      description: 'List, kill, or get info about processes',
      parameters: {
        action: { type: 'string', required: true, description: "Action: 'list', 'kill', 'info'" },
        process_name: { type: 'string', required: false, description: 'Process name (for kill/info actions)' },
        pid: { type: 'integer', required: false, description: 'Process ID (for kill/info actions)' },
      },
    },
    ProcessInputSchema,
    async ({ action, process_name: processName, pid }) => {
      if (action !== 'list' && pid === undefined && processName === undefined) {
        return `Either 'pid' or 'process_name' must be provided for ${action} action`;
      }

      try {
        if (action === 'kill' && pid !== undefined) {
          process.kill(pid, 'SIGTERM');
          return `Process ${pid} terminated`;
        }

        const listing = await listProcesses(environment);
        if (typeof listing === 'string') return listing;

        if (action === 'list') {
          const top = [...listing].sort((a, b) => b.cpuPercent - a.cpuPercent).slice(0, PROCESS_LIST_LIMIT);
          return ['Top processes by CPU usage:', ...top.map(formatProcess)].join('\n');
        }

        if (action === 'kill') {
          const targets = listing.filter(entry => entry.name === processName && entry.pid !== process.pid);
          for (const entry of targets) {
            process.kill(entry.pid, 'SIGTERM');
          }
          return `Terminated ${targets.length} processes named '${processName}'`;
        }

        const found = listing.find(entry => (pid !== undefined ? entry.pid === pid : entry.name === processName));
        if (!found) {
          return pid !== undefined ? `Process ${pid} not found` : `Process '${processName}' not found`;
        }
        return [
          `PID: ${found.pid}`,
          `Name: ${found.name}`,
          `Parent PID: ${found.ppid}`,
          `Status: ${found.status}`,
          `CPU: ${found.cpuPercent.toFixed(1)}%`,
          `Memory: ${found.memoryPercent.toFixed(1)}%`,
        ].join('\n');
      } catch (error) {
        return `Error managing process: ${errorMessage(error)}`;
      }
    },
  );
}

/**
 * Parses `ps -o pid=,ppid=,stat=,pcpu=,pmem=,comm=` output. Lines that do
 * not fit the columns are dropped.
 */
export function parseProcessTable(stdout: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of stdout.split('\n')) {
    const match = PS_LINE.exec(line);
    if (!match) continue;
    const [, pid = '', ppid = '', status = '', cpu = '', memory = '', name = ''] = match;
    entries.push({
      pid: Number(pid),
      ppid: Number(ppid),
      status,
      cpuPercent: Number(cpu),
      memoryPercent: Number(memory),
      name: name.trim(),
    });
  }
  return entries;
}

export function createEnvironmentTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'manage_environment',
      description: 'Get, set, or list environment variables',
      parameters: {
        action: { type: 'string', required: true, description: "Action: 'get', 'set', 'list', 'unset'" },
        variable: { type: 'string', required: false, description: 'Environment variable name' },
        value: { type: 'string', required: false, description: 'Value to set (for set action)' },
      },
    },
    EnvironmentInputSchema,
    async ({ action, variable, value }) => {
      const env = environment.env ?? process.env;

      if (action === 'list') {
        return Object.keys(env)
          .sort()
          .slice(0, ENV_LIST_LIMIT)
          .map(key => {
            const current = env[key] ?? '';
            const shown = current.length > ENV_VALUE_LIMIT ? `${current.slice(0, ENV_VALUE_LIMIT)}...` : current;
            return `${key}=${shown}`;
          })
          .join('\n');
      }

      if (!variable) {
        return `Variable name is required for ${action} action`;
      }

      switch (action) {
        case 'get': {
          const current = env[variable];
          return current === undefined
            ? `Environment variable '${variable}' not found`
            : `${variable}=${current}`;
        }

        case 'set':
          env[variable] = value;
          return `Set ${variable}=${value}`;

        case 'unset':
          if (env[variable] === undefined) {
            return `Environment variable '${variable}' not found`;
          }
          delete env[variable];
          return `Unset ${variable}`;
      }
    },
  );
}

/**
 * All system tools.
 */
export function createSystemTools(environment: ToolEnvironment = {}): Tool[] {
  return [
    createRunCommandTool(environment),
    createSystemInfoTool(environment),
    createProcessTool(environment),
    createEnvironmentTool(environment),
  ];
}

async function listProcesses(environment: ToolEnvironment): Promise<ProcessEntry[] | string> {
  const result = await runFile('ps', ['-eo', PS_COLUMNS], { cwd: environment.cwd, timeoutMs: PS_TIMEOUT_MS });
  if (result.missing) {
    return 'Process listing is not available: ps was not found';
  }
  if (result.exitCode !== 0) {
    return `Error managing process: ${result.stderr.trim() || `ps exited with code ${result.exitCode}`}`;
  }
  return parseProcessTable(result.stdout);
}

function formatProcess(entry: ProcessEntry): string {
  return `PID: ${entry.pid}, Name: ${entry.name}, CPU: ${entry.cpuPercent.toFixed(1)}%, Memory: ${entry.memoryPercent.toFixed(1)}%`;
}

function formatGigabytes(bytes: number): string {
  return `${(bytes / 1024 ** 3).toFixed(2)} GB`;
}
