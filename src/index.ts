/**
 * @fileoverview taskpilot public API.
 *
 * @example
 * ```typescript
 * import { AgentLoop, MemoryStore, ToolRegistry, createModel, loadConfig, registerDefaultTools } from 'taskpilot';
 *
 * const config = await loadConfig();
 * const registry = registerDefaultTools(new ToolRegistry(), config.tools);
 * const loop = new AgentLoop({ model: createModel(config.model), registry, memory: new MemoryStore() });
 * const result = await loop.run('Summarize the README');
 * ```
 *
 * @module taskpilot
 */

export * from './types/index.js';
export * from './agent/index.js';
export * from './parsing/response-extractor.js';
export * from './prompt/prompt-assembler.js';
export * from './memory/memory-store.js';
export * from './registry/tool-registry.js';
export * from './registry/tool-categories.js';
export * from './providers/index.js';
export * from './observability/index.js';
export * from './config/config.js';
export * from './tools/index.js';
