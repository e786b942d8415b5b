/**
 * @fileoverview Tool Registry - Central registry for tool management.
 *
 * The registry holds named tool descriptors and their handlers, validates
 * model-supplied arguments against the descriptors and dispatches calls.
 * It is the boundary at which handler failures become result strings:
 * `invoke` never rejects.
 *
 * Duplicate names are rejected with {@link DuplicateToolError}; a registry
 * never silently replaces a tool.
 *
 * @module taskpilot/registry/tool-registry
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { UniqueId } from '../types/core.types.js';
import { createUniqueId } from '../types/core.types.js';
import { DuplicateToolError, errorMessage } from '../types/errors.js';
import type {
  ParameterType,
  Tool,
  ToolDescriptor,
  ToolHandler,
  ValidationIssue,
  ValidationResult,
} from '../types/tools.types.js';
import {
  ToolDescriptorSchema,
  validationFailure,
  validationSuccess,
} from '../types/tools.types.js';

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (descriptor: ToolDescriptor) => void;
  'tool:invoked': (toolName: string, executionId: UniqueId, args: Readonly<Record<string, unknown>>) => void;
  'tool:completed': (toolName: string, executionId: UniqueId, result: string, durationMs: number) => void;
  'tool:failed': (toolName: string, executionId: UniqueId, message: string) => void;
}

/**
 * Configuration for the Tool Registry.
 */
export interface ToolRegistryConfig {
  /**
   * Upper bound for a single handler call. Unset means no bound: a hung
   * handler stalls the caller, matching the loop's contract.
   */
  readonly timeoutMs?: number;
}

interface RegistryEntry {
  readonly descriptor: ToolDescriptor;
  readonly handler: ToolHandler;
}

/**
 * Central registry for tool management.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.registerTool(readFileTool);
 * const result = await registry.invoke('read_file', { path: 'README.md' });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> {
  private readonly tools: Map<string, RegistryEntry>;
  private readonly config: ToolRegistryConfig;

  constructor(config: ToolRegistryConfig = {}) {
    super();
    this.tools = new Map();
    this.config = config;
  }

  /**
   * Registers a tool under its descriptor name.
   *
   * @throws DuplicateToolError if the name is already registered
   * @throws ZodError if the descriptor is malformed
   */
  register(descriptor: ToolDescriptor, handler: ToolHandler): void {
    if (this.tools.has(descriptor.name)) {
      throw new DuplicateToolError(descriptor.name);
    }
    ToolDescriptorSchema.parse(descriptor);

    const frozen = freezeDescriptor(descriptor);
    this.tools.set(frozen.name, { descriptor: frozen, handler });
    this.emit('tool:registered', frozen);
  }

  /**
   * Registers a descriptor-carrying tool.
   */
  registerTool(tool: Tool): void {
    this.register(tool.descriptor, tool);
  }

  /**
   * Gets a handler by name.
   *
   * @returns The handler or null if not found
   */
  lookup(name: string): ToolHandler | null {
    return this.tools.get(name)?.handler ?? null;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Names in registration order.
   */
  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * All descriptors keyed by name, in registration order.
   */
  describeAll(): ReadonlyMap<string, ToolDescriptor> {
    const descriptors = new Map<string, ToolDescriptor>();
    for (const [name, entry] of this.tools) {
      descriptors.set(name, entry.descriptor);
    }
    return descriptors;
  }

  /**
   * Checks arguments against a tool's descriptor. Missing required
   * parameters are errors; type mismatches are warnings only.
   */
  validate(name: string, args: Readonly<Record<string, unknown>>): ValidationResult {
    const entry = this.tools.get(name);
    if (!entry) {
      return validationFailure([{
        field: '',
        code: 'TOOL_NOT_FOUND',
        message: `Tool '${name}' is not registered`,
      }]);
    }

    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];

    for (const [param, spec] of Object.entries(entry.descriptor.parameters)) {
      if (!Object.prototype.hasOwnProperty.call(args, param)) {
        if (spec.required) {
          errors.push({
            field: param,
            code: 'MISSING_PARAMETER',
            message: `missing required parameter '${param}' for tool '${name}'`,
          });
        }
        continue;
      }

      const actual = describeType(args[param]);
      if (!typeMatches(spec.type, args[param])) {
        warnings.push({
          field: param,
          code: 'TYPE_MISMATCH',
          message: `parameter '${param}' should be ${spec.type}, got ${actual}`,
        });
      }
    }

    return errors.length > 0 ? validationFailure(errors, warnings) : validationSuccess(warnings);
  }

  /**
   * Validates and executes a tool. Never rejects: unknown tools,
   * validation failures, handler exceptions and timeouts all come back as
   * result strings so the model can react to them next turn.
   */
  async invoke(name: string, args: Readonly<Record<string, unknown>>): Promise<string> {
    const entry = this.tools.get(name);
    if (!entry) {
      return `Unknown tool: ${name}. Available tools: ${this.names().join(', ')}`;
    }

    const validation = this.validate(name, args);
    if (!validation.valid) {
      return `Error: ${validation.errors.map(e => e.message).join('; ')}`;
    }

    const executionId = createUniqueId(uuidv4());
    const startTime = Date.now();
    this.emit('tool:invoked', name, executionId, args);

    try {
      const result = await this.executeWithTimeout(entry.handler, args);
      this.emit('tool:completed', name, executionId, result, Date.now() - startTime);
      return result;
    } catch (error) {
      const message = errorMessage(error);
      this.emit('tool:failed', name, executionId, message);
      return `Error executing ${name}: ${message}`;
    }
  }

  /**
   * Builds a registry holding only the tools the predicate accepts.
   */
  filter(predicate: (descriptor: ToolDescriptor) => boolean): ToolRegistry {
    const filtered = new ToolRegistry(this.config);
    for (const entry of this.tools.values()) {
      if (predicate(entry.descriptor)) {
        filtered.register(entry.descriptor, entry.handler);
      }
    }
    return filtered;
  }

  /**
   * Human-readable help for one tool.
   */
  getToolHelp(name: string): string {
    const entry = this.tools.get(name);
    if (!entry) {
      return `Tool '${name}' not found`;
    }

    const { descriptor } = entry;
    const lines = [descriptor.name, '', `Description: ${descriptor.description}`, '', 'Parameters:'];
    const params = Object.entries(descriptor.parameters);

    if (params.length === 0) {
      lines.push('  No parameters required.');
    }
    for (const [param, spec] of params) {
      let line = `  - ${param} (${spec.type}, ${spec.required ? 'required' : 'optional'}): ${spec.description}`;
      if (spec.default !== undefined) {
        line += ` (default: ${JSON.stringify(spec.default)})`;
      }
      lines.push(line);
    }

    return lines.join('\n');
  }

  // ============ Private Methods ============

  private executeWithTimeout(
    handler: ToolHandler,
    args: Readonly<Record<string, unknown>>,
  ): Promise<string> {
    const timeoutMs = this.config.timeoutMs;
    if (timeoutMs === undefined) {
      return handler.execute(args).then(coerceResult);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new Error(`Tool execution timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      handler.execute(args)
        .then(result => {
          clearTimeout(timer);
          resolve(coerceResult(result));
        })
        .catch((error: unknown) => {
          clearTimeout(timer);
          reject(error);
        });
    });
  }
}

/**
 * Handlers are typed to return strings, but JavaScript callers may not be.
 */
function coerceResult(result: unknown): string {
  if (typeof result === 'string') return result;
  if (result === undefined || result === null) return '';
  return JSON.stringify(result);
}

function freezeDescriptor(descriptor: ToolDescriptor): ToolDescriptor {
  const parameters: ToolDescriptor['parameters'] = Object.freeze(
    Object.fromEntries(
      Object.entries(descriptor.parameters).map(([name, spec]) => [name, Object.freeze({ ...spec })]),
    ),
  );
  return Object.freeze({
    name: descriptor.name,
    description: descriptor.description,
    parameters,
  });
}

function typeMatches(expected: ParameterType, value: unknown): boolean {
  switch (expected) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number' && Number.isFinite(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return value !== null && typeof value === 'object' && !Array.isArray(value);
  }
}

function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}
