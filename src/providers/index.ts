/**
 * @fileoverview Provider exports
 */

export * from './base.js';
export * from './mock.js';
export * from './openai.js';
export * from './anthropic.js';

import { ModelProvider, type ModelConfig, type ModelInterface } from './base.js';
import { MockModel } from './mock.js';
import { OpenAIModel } from './openai.js';
import { AnthropicModel } from './anthropic.js';

/**
 * Create a model adapter based on the configured provider.
 */
export function createModel(config: ModelConfig): ModelInterface {
  switch (config.provider) {
    case ModelProvider.MOCK:
      return new MockModel();

    case ModelProvider.OPENAI:
      return new OpenAIModel(config);

    case ModelProvider.ANTHROPIC:
      return new AnthropicModel(config);
  }
}

