/**
 * @fileoverview Anthropic Provider
 *
 * Single-turn request against the Anthropic messages API. Text blocks of
 * the reply are concatenated; other block types are ignored.
 *
 * @see https://docs.anthropic.com/en/api/messages
 */

import { z } from 'zod';
import { BaseModel, ModelProvider } from './base.js';

export const ANTHROPIC_DEFAULT_MODEL = 'claude-3-5-sonnet-latest';
export const ANTHROPIC_DEFAULT_BASE_URL = 'https://api.anthropic.com/v1';
const ANTHROPIC_API_VERSION = '2023-06-01';

const MessageResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string(),
    text: z.string().optional(),
  })),
});

/**
 * Anthropic messages adapter.
 */
export class AnthropicModel extends BaseModel {
  override readonly name = ModelProvider.ANTHROPIC;

  override async ask(prompt: string): Promise<string> {
    const apiKey = this.requireApiKey('ANTHROPIC_API_KEY');
    const baseUrl = this.config.baseUrl ?? ANTHROPIC_DEFAULT_BASE_URL;

    const response = await this.postJson(
      `${baseUrl}/messages`,
      {
        'x-api-key': apiKey,
        'anthropic-version': ANTHROPIC_API_VERSION,
      },
      {
        model: this.config.model ?? ANTHROPIC_DEFAULT_MODEL,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: prompt }],
      },
      MessageResponseSchema,
    );

    return response.content
      .filter(block => block.type === 'text')
      .map(block => block.text ?? '')
      .join('')
      .trim();
  }
}
