/**
 * @fileoverview Built-in tool set.
 *
 * @module taskpilot/tools
 */

import type { Tool } from '../types/tools.types.js';
import type { ToolRegistry } from '../registry/tool-registry.js';
import { categoryOf, type ToolCategory } from '../registry/tool-categories.js';
import { createSystemTools } from './system.js';
import { createFilesystemTools } from './filesystem.js';
import { createWebTools } from './web.js';
import { createDevelopmentTools } from './development.js';
import type { ToolEnvironment } from './shared.js';

export { createSystemTools } from './system.js';
export { createFilesystemTools, globToRegExp } from './filesystem.js';
export { createWebTools, filenameFromUrl } from './web.js';
export {
  createDevelopmentTools,
  buildGitCommand,
  buildPackageCommand,
  buildTestCommand,
  type CommandPlan,
} from './development.js';
export { defineTool, type ToolEnvironment } from './shared.js';

/**
 * Which tools a registry should keep.
 */
export interface ToolSelection {
  readonly disabledTools?: ReadonlyArray<string>;
  /** Tools outside every category are kept regardless */
  readonly enabledCategories?: ReadonlyArray<ToolCategory>;
}

/**
 * Every built-in tool, in category order.
 */
export function createDefaultTools(environment: ToolEnvironment = {}): Tool[] {
  return [
    ...createSystemTools(environment),
    ...createFilesystemTools(environment),
    ...createWebTools(environment),
    ...createDevelopmentTools(environment),
  ];
}

/**
 * Registers the built-in tools that the selection allows.
 *
 * @returns The same registry
 */
export function registerDefaultTools(
  registry: ToolRegistry,
  selection: ToolSelection = {},
  environment: ToolEnvironment = {},
): ToolRegistry {
  for (const tool of createDefaultTools(environment)) {
    if (isSelected(tool.descriptor.name, selection)) {
      registry.registerTool(tool);
    }
  }
  return registry;
}

/**
 * Whether a tool survives the selection.
 */
export function isSelected(toolName: string, selection: ToolSelection): boolean {
  if (selection.disabledTools?.includes(toolName)) {
    return false;
  }
  const category = categoryOf(toolName);
  if (category === null || selection.enabledCategories === undefined) {
    return true;
  }
  return selection.enabledCategories.includes(category);
}
