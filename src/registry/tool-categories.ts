/**
 * @fileoverview Tool → category table.
 *
 * Display-only grouping. The prompt assembler, the `tools` command and the
 * configuration's `enabledCategories` filter all read this table; nothing
 * else hard-codes category membership.
 *
 * @module taskpilot/registry/tool-categories
 */

export enum ToolCategory {
  SYSTEM = 'System',
  FILES = 'Files',
  WEB = 'Web',
  DEVELOPMENT = 'Development',
}

/** Heading used for tools that appear in no category. */
export const UNCATEGORIZED = 'Other';

/**
 * Category membership in display order.
 */
export const TOOL_CATEGORIES: ReadonlyArray<{ readonly category: ToolCategory; readonly tools: ReadonlyArray<string> }> = [
  {
    category: ToolCategory.SYSTEM,
    tools: ['run_command', 'get_system_info', 'manage_process', 'manage_environment'],
  },
  {
    category: ToolCategory.FILES,
    tools: ['read_file', 'write_file', 'list_directory', 'file_operations', 'search_files'],
  },
  {
    category: ToolCategory.WEB,
    tools: ['api_request', 'download_file', 'search_web', 'scrape_web'],
  },
  {
    category: ToolCategory.DEVELOPMENT,
    tools: ['git_operations', 'manage_packages', 'run_tests'],
  },
];

/**
 * Returns the category of a tool, or `null` when it has none.
 */
export function categoryOf(toolName: string): ToolCategory | null {
  for (const group of TOOL_CATEGORIES) {
    if (group.tools.includes(toolName)) return group.category;
  }
  return null;
}

/**
 * Groups tool names by category. Categories keep table order and tools keep
 * table order within a category; names missing from the table are collected
 * under {@link UNCATEGORIZED} in the order given. Empty groups are omitted.
 */
export function groupByCategory(toolNames: Iterable<string>): Array<{ category: string; tools: string[] }> {
  const available = new Set(toolNames);
  const groups: Array<{ category: string; tools: string[] }> = [];

  for (const group of TOOL_CATEGORIES) {
    const tools = group.tools.filter(name => available.has(name));
    if (tools.length > 0) {
      groups.push({ category: group.category, tools });
    }
  }

  const other = [...available].filter(name => categoryOf(name) === null);
  if (other.length > 0) {
    groups.push({ category: UNCATEGORIZED, tools: other });
  }

  return groups;
}
