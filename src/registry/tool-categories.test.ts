import { describe, it, expect } from 'vitest';
import { ToolCategory, UNCATEGORIZED, categoryOf, groupByCategory } from './tool-categories.js';

describe('tool categories', () => {
  it('should look up the category of a known tool', () => {
    expect(categoryOf('read_file')).toBe(ToolCategory.FILES);
    expect(categoryOf('git_operations')).toBe(ToolCategory.DEVELOPMENT);
  });

  it('should return null for unknown tools', () => {
    expect(categoryOf('custom_tool')).toBeNull();
  });

  it('should group in table order and collect leftovers last', () => {
    const groups = groupByCategory(['zeta', 'write_file', 'run_command', 'read_file', 'alpha']);

    expect(groups).toEqual([
      { category: 'System', tools: ['run_command'] },
      { category: 'Files', tools: ['read_file', 'write_file'] },
      { category: UNCATEGORIZED, tools: ['zeta', 'alpha'] },
    ]);
  });

  it('should return no groups for no tools', () => {
    expect(groupByCategory([])).toEqual([]);
  });
});
