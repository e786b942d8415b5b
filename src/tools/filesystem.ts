/**
 * @fileoverview Built-in filesystem tools.
 *
 * Relative paths resolve against the tool environment's working
 * directory. Access is not restricted to it.
 *
 * @module taskpilot/tools/filesystem
 */

import type { Dirent, Stats } from 'node:fs';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import type { Tool } from '../types/tools.types.js';
import { errorMessage } from '../types/errors.js';
import { SEPARATOR, defineTool, resolvePath, type ToolEnvironment } from './shared.js';

/** Files above this size are not read. */
export const MAX_READ_BYTES = 10 * 1024 * 1024;

// ============ Input Schemas ============

const ReadFileInputSchema = z.object({
  path: z.string().min(1),
  max_lines: z.number().int().positive().default(100),
  encoding: z.enum(['utf-8', 'utf8', 'ascii', 'latin1', 'base64']).default('utf-8'),
});

const WriteFileInputSchema = z.object({
  path: z.string().min(1),
  content: z.string(),
  mode: z.enum(['write', 'append']).default('write'),
  create_dirs: z.boolean().default(true),
});

const ListDirectoryInputSchema = z.object({
  path: z.string().default('.'),
  show_hidden: z.boolean().default(false),
  recursive: z.boolean().default(false),
  max_depth: z.number().int().positive().default(2),
});

const FileOperationsInputSchema = z.object({
  operation: z.enum(['copy', 'move', 'delete', 'mkdir', 'rmdir']),
  source: z.string().optional(),
  destination: z.string().optional(),
  recursive: z.boolean().default(false),
});

const SearchFilesInputSchema = z.object({
  search_type: z.enum(['name', 'content']),
  query: z.string().min(1),
  path: z.string().default('.'),
  file_pattern: z.string().default('*'),
  max_results: z.number().int().positive().default(20),
});

type ListDirectoryInput = z.infer<typeof ListDirectoryInputSchema>;

// ============ Helper Functions ============

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Converts a `*`/`?` glob to an anchored regular expression.
 */
export function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split('')
    .map(ch => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  return new RegExp(`^${source}$`, 'i');
}

/**
 * Walks a directory tree depth-first in name order, yielding files and
 * directories relative to `root`. Subdirectories that cannot be read are
 * skipped.
 */
async function* walk(root: string, relative: string = ''): AsyncGenerator<{ relative: string; isDirectory: boolean }> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });
  } catch (error) {
    if (relative === '') throw error;
    return;
  }
  entries.sort((a, b) => a.name.localeCompare(b.name));

  for (const entry of entries) {
    const child = relative ? path.join(relative, entry.name) : entry.name;
    if (entry.isDirectory()) {
      yield { relative: child, isDirectory: true };
      yield* walk(root, child);
    } else if (entry.isFile()) {
      yield { relative: child, isDirectory: false };
    }
  }
}

/**
 * Text of a file for a content search, or null when it is too large,
 * unreadable or binary.
 */
async function readSearchable(file: string): Promise<string | null> {
  try {
    const { size } = await fs.stat(file);
    if (size > MAX_READ_BYTES) return null;

    const content = await fs.readFile(file, 'utf-8');
    return content.includes('\u0000') ? null : content;
  } catch {
    return null;
  }
}

async function listEntries(
  absolute: string,
  input: ListDirectoryInput,
  depth: number,
  lines: string[],
): Promise<void> {
  const entries = await fs.readdir(absolute, { withFileTypes: true });
  entries.sort((a, b) => a.name.localeCompare(b.name));
  const indent = '  '.repeat(depth);

  for (const entry of entries) {
    if (!input.show_hidden && entry.name.startsWith('.')) continue;

    const child = path.join(absolute, entry.name);
    if (entry.isDirectory()) {
      lines.push(`${indent}${entry.name}/`);
      if (input.recursive && depth + 1 < input.max_depth) {
        await listEntries(child, input, depth + 1, lines);
      }
    } else {
      const stats = await fs.stat(child);
      lines.push(`${indent}${entry.name} (${stats.size} bytes)`);
    }
  }
}

// ============ Tool Implementations ============

export function createReadFileTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'read_file',
      description: 'Read the contents of a file',
      parameters: {
        path: { type: 'string', required: true, description: 'Path to the file to read' },
        max_lines: { type: 'integer', required: false, default: 100, description: 'Maximum number of lines to read' },
        encoding: { type: 'string', required: false, default: 'utf-8', description: 'File encoding' },
      },
    },
    ReadFileInputSchema,
    async input => {
      const target = resolvePath(environment, input.path);

      try {
        const stats = await statOrNull(target);
        if (!stats) return `File not found: ${input.path}`;
        if (!stats.isFile()) return `Path is not a file: ${input.path}`;
        if (stats.size > MAX_READ_BYTES) {
          return `File too large (${(stats.size / 1024 / 1024).toFixed(1)}MB). Use a different approach for large files.`;
        }

        const content = await fs.readFile(target, { encoding: input.encoding });
        const allLines = content.split(/\r?\n/);
        if (allLines.length > 1 && allLines[allLines.length - 1] === '') {
          allLines.pop();
        }

        const lines = allLines.slice(0, input.max_lines).map(line => line.trimEnd());
        if (allLines.length > input.max_lines) {
          lines.push(`... (truncated after ${input.max_lines} lines)`);
        }

        return `File: ${input.path} (${stats.size} bytes, ${lines.length} lines)\n${SEPARATOR}\n${lines.join('\n')}`;
      } catch (error) {
        return `Error reading file ${input.path}: ${errorMessage(error)}`;
      }
    },
  );
}

export function createWriteFileTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'write_file',
      description: 'Write content to a file',
      parameters: {
        path: { type: 'string', required: true, description: 'Path to the file to write' },
        content: { type: 'string', required: true, description: 'Content to write to the file' },
        mode: { type: 'string', required: false, default: 'write', description: "Write mode: 'write' (overwrite) or 'append'" },
        create_dirs: { type: 'boolean', required: false, default: true, description: "Create parent directories if they don't exist" },
      },
    },
    WriteFileInputSchema,
    async input => {
      const target = resolvePath(environment, input.path);

      try {
        if (input.create_dirs) {
          await fs.mkdir(path.dirname(target), { recursive: true });
        }

        if (input.mode === 'append') {
          await fs.appendFile(target, input.content, 'utf-8');
        } else {
          await fs.writeFile(target, input.content, 'utf-8');
        }

        const { size } = await fs.stat(target);
        const verb = input.mode === 'append' ? 'appended to' : 'written to';
        return `Content ${verb} ${input.path} (${size} bytes)`;
      } catch (error) {
        return `Error writing file ${input.path}: ${errorMessage(error)}`;
      }
    },
  );
}

export function createListDirectoryTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'list_directory',
      description: 'List contents of a directory',
      parameters: {
        path: { type: 'string', required: false, default: '.', description: 'Path to the directory to list' },
        show_hidden: { type: 'boolean', required: false, default: false, description: 'Show hidden files (starting with .)' },
        recursive: { type: 'boolean', required: false, default: false, description: 'List recursively' },
        max_depth: { type: 'integer', required: false, default: 2, description: 'Maximum recursion depth' },
      },
    },
    ListDirectoryInputSchema,
    async input => {
      const target = resolvePath(environment, input.path);

      try {
        const stats = await statOrNull(target);
        if (!stats) return `Directory not found: ${input.path}`;
        if (!stats.isDirectory()) return `Path is not a directory: ${input.path}`;

        const lines: string[] = [];
        await listEntries(target, input, 0, lines);

        if (lines.length === 0) {
          return `Directory ${input.path} is empty`;
        }
        return `Contents of ${target}:\n${SEPARATOR}\n${lines.join('\n')}`;
      } catch (error) {
        return `Error listing directory ${input.path}: ${errorMessage(error)}`;
      }
    },
  );
}

export function createFileOperationsTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'file_operations',
      description: 'Perform file operations: copy, move, delete, create directory',
      parameters: {
        operation: { type: 'string', required: true, description: "Operation: 'copy', 'move', 'delete', 'mkdir', 'rmdir'" },
        source: { type: 'string', required: false, description: 'Source path' },
        destination: { type: 'string', required: false, description: 'Destination path (for copy/move operations)' },
        recursive: { type: 'boolean', required: false, default: false, description: 'Recursive operation for directories' },
      },
    },
    FileOperationsInputSchema,
    async ({ operation, source, destination, recursive }) => {
      if (!source) {
        return `Source path is required for ${operation} operation`;
      }
      const from = resolvePath(environment, source);

      try {
        switch (operation) {
          case 'copy':
          case 'move': {
            if (!destination) {
              return `Both source and destination are required for ${operation} operation`;
            }
            const stats = await statOrNull(from);
            if (!stats) return `Source not found: ${source}`;

            const to = resolvePath(environment, destination);
            if (operation === 'move') {
              await fs.rename(from, to);
              return `Moved from ${source} to ${destination}`;
            }
            if (stats.isDirectory()) {
              if (!recursive) return 'Use recursive=true to copy directories';
              await fs.cp(from, to, { recursive: true });
              return `Directory copied from ${source} to ${destination}`;
            }
            await fs.copyFile(from, to);
            return `File copied from ${source} to ${destination}`;
          }

          case 'delete': {
            const stats = await statOrNull(from);
            if (!stats) return `Path not found: ${source}`;
            if (stats.isDirectory()) {
              if (!recursive) return 'Use recursive=true to delete directories';
              await fs.rm(from, { recursive: true });
              return `Directory deleted: ${source}`;
            }
            await fs.unlink(from);
            return `File deleted: ${source}`;
          }

          case 'mkdir':
            await fs.mkdir(from, { recursive: true });
            return `Directory created: ${source}`;

          case 'rmdir': {
            const stats = await statOrNull(from);
            if (!stats) return `Directory not found: ${source}`;
            if (!stats.isDirectory()) return `Path is not a directory: ${source}`;
            await fs.rmdir(from);
            return `Empty directory removed: ${source}`;
          }
        }
      } catch (error) {
        return `Error performing ${operation}: ${errorMessage(error)}`;
      }
    },
  );
}

export function createSearchFilesTool(environment: ToolEnvironment = {}): Tool {
  return defineTool(
    {
      name: 'search_files',
      description: 'Search for files by name or content',
      parameters: {
        search_type: { type: 'string', required: true, description: "Search type: 'name' or 'content'" },
        query: { type: 'string', required: true, description: 'Search query (filename fragment or text content)' },
        path: { type: 'string', required: false, default: '.', description: 'Directory to search in' },
        file_pattern: { type: 'string', required: false, default: '*', description: "File pattern to limit a content search (e.g. '*.ts')" },
        max_results: { type: 'integer', required: false, default: 20, description: 'Maximum number of results' },
      },
    },
    SearchFilesInputSchema,
    async input => {
      const root = resolvePath(environment, input.path);
      const needle = input.query.toLowerCase();
      const results: string[] = [];

      try {
        const stats = await statOrNull(root);
        if (!stats || !stats.isDirectory()) return `Search path not found: ${input.path}`;

        const filePattern = globToRegExp(input.file_pattern);

        for await (const entry of walk(root)) {
          if (results.length >= input.max_results) break;
          const display = path.join(input.path, entry.relative);

          if (input.search_type === 'name') {
            if (!path.basename(entry.relative).toLowerCase().includes(needle)) continue;
            if (entry.isDirectory) {
              results.push(`${display}/`);
            } else {
              const stats = await statOrNull(path.join(root, entry.relative));
              if (stats) results.push(`${display} (${stats.size} bytes)`);
            }
            continue;
          }

          if (entry.isDirectory || !filePattern.test(path.basename(entry.relative))) continue;

          const content = await readSearchable(path.join(root, entry.relative));
          if (content === null) continue;

          for (const [i, line] of content.split(/\r?\n/).entries()) {
            if (line.toLowerCase().includes(needle)) {
              results.push(`${display}:${i + 1}: ${line.trim()}`);
              if (results.length >= input.max_results) break;
            }
          }
        }
      } catch (error) {
        return `Error searching: ${errorMessage(error)}`;
      }

      if (results.length === 0) {
        return `No results found for '${input.query}'`;
      }
      return `Search results for '${input.query}' (${results.length} found):\n${SEPARATOR}\n${results.join('\n')}`;
    },
  );
}

/**
 * All filesystem tools.
 */
export function createFilesystemTools(environment: ToolEnvironment = {}): Tool[] {
  return [
    createReadFileTool(environment),
    createWriteFileTool(environment),
    createListDirectoryTool(environment),
    createFileOperationsTool(environment),
    createSearchFilesTool(environment),
  ];
}
