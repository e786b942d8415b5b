/**
 * @fileoverview OpenAI Provider
 *
 * Single-turn chat completion against OpenAI or any OpenAI-compatible API
 * (Azure OpenAI, LocalAI, Ollama, etc.).
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import { z } from 'zod';
import { BaseModel, ModelProvider } from './base.js';

export const OPENAI_DEFAULT_MODEL = 'gpt-4o-mini';
export const OPENAI_DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullable(),
    }),
  })).min(1),
});

/**
 * OpenAI chat completions adapter.
 */
export class OpenAIModel extends BaseModel {
  override readonly name = ModelProvider.OPENAI;

  override async ask(prompt: string): Promise<string> {
    const apiKey = this.requireApiKey('OPENAI_API_KEY');
    const baseUrl = this.config.baseUrl ?? OPENAI_DEFAULT_BASE_URL;

    const response = await this.postJson(
      `${baseUrl}/chat/completions`,
      { Authorization: `Bearer ${apiKey}` },
      {
        model: this.config.model ?? OPENAI_DEFAULT_MODEL,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      },
      ChatCompletionSchema,
    );

    return (response.choices[0]?.message.content ?? '').trim();
  }
}
