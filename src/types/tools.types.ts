/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the mechanism by which the agent affects the outside world.
 * A tool is described by a {@link ToolDescriptor} (what the model sees in
 * its prompt) and executed through a {@link ToolHandler}. Arguments come
 * from model-parsed text, so handlers must not assume they are well typed.
 *
 * @module taskpilot/types/tools
 */

import { z } from 'zod';

/**
 * Type tags a parameter can declare. Checked by the registry as advisory
 * warnings only.
 */
export type ParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object';

/**
 * Description of a single tool parameter.
 */
export interface ParameterSpec {
  readonly type: ParameterType;
  readonly required: boolean;
  readonly default?: unknown;
  readonly description: string;
}

/**
 * Self-description of a tool. Immutable once registered.
 */
export interface ToolDescriptor {
  /** Unique key within a registry */
  readonly name: string;

  /** One-line description shown in the prompt */
  readonly description: string;

  /** Parameters in display order */
  readonly parameters: Readonly<Record<string, ParameterSpec>>;
}

/**
 * Executes a tool. The returned string is what the model sees next turn.
 * Throwing is allowed: the registry converts the exception to a result.
 */
export interface ToolHandler {
  execute(args: Readonly<Record<string, unknown>>): Promise<string>;
}

/**
 * A descriptor and its handler bundled together.
 */
export interface Tool extends ToolHandler {
  readonly descriptor: ToolDescriptor;
}

/**
 * Result of argument validation.
 */
export interface ValidationResult {
  readonly valid: boolean;
  readonly errors: ReadonlyArray<ValidationIssue>;
  readonly warnings: ReadonlyArray<ValidationIssue>;
}

export type ValidationCode = 'TOOL_NOT_FOUND' | 'MISSING_PARAMETER' | 'TYPE_MISMATCH';

/**
 * A single problem found during validation.
 */
export interface ValidationIssue {
  /** Parameter name; empty for tool-level issues */
  readonly field: string;
  readonly code: ValidationCode;
  readonly message: string;
}

/**
 * Zod schemas for descriptors supplied at runtime boundaries.
 */
export const ParameterTypeSchema = z.enum(['string', 'integer', 'number', 'boolean', 'array', 'object']);

export const ParameterSpecSchema = z.object({
  type: ParameterTypeSchema,
  required: z.boolean(),
  default: z.unknown().optional(),
  description: z.string(),
});

export const ToolDescriptorSchema = z.object({
  name: z.string().min(1).regex(/^[A-Za-z0-9_.-]+$/, 'Tool names may only contain letters, digits, _, . and -'),
  description: z.string(),
  parameters: z.record(ParameterSpecSchema),
});

/**
 * Helper to create a successful validation result.
 */
export function validationSuccess(warnings: ValidationIssue[] = []): ValidationResult {
  return {
    valid: true,
    errors: [],
    warnings,
  };
}

/**
 * Helper to create a failed validation result.
 */
export function validationFailure(errors: ValidationIssue[], warnings: ValidationIssue[] = []): ValidationResult {
  return {
    valid: false,
    errors,
    warnings,
  };
}
