/**
 * @fileoverview Base model interface for multi-provider support.
 *
 * The agent loop talks to a language model through one narrow method,
 * `ask(prompt)`. Concrete adapters:
 * - Mock (scripted replies, no network)
 * - OpenAI chat completions and compatible APIs
 * - Anthropic messages
 *
 * The adapter is chosen once from configuration, never by inspecting
 * objects at runtime.
 *
 * @module taskpilot/providers
 */

import { z } from 'zod';
import { ModelError, errorMessage } from '../types/errors.js';

/**
 * Supported model providers.
 */
export enum ModelProvider {
  /** Scripted replies for tests and dry runs */
  MOCK = 'mock',

  /** OpenAI chat completions */
  OPENAI = 'openai',

  /** Anthropic messages API */
  ANTHROPIC = 'anthropic',
}

/**
 * The only thing the loop needs from a model.
 * `ask` may reject on timeout or network failure.
 */
export interface ModelInterface {
  readonly name: string;
  ask(prompt: string): Promise<string>;
}

/**
 * Model adapter configuration.
 */
export interface ModelConfig {
  readonly provider: ModelProvider;

  /** Provider model id; each adapter has its own default */
  readonly model?: string | undefined;

  readonly apiKey?: string | undefined;

  /** Override for OpenAI-compatible or proxied endpoints */
  readonly baseUrl?: string | undefined;

  readonly temperature: number;
  readonly maxTokens: number;

  /** Per-request timeout */
  readonly timeoutMs: number;
}

export const DEFAULT_MODEL_CONFIG: ModelConfig = {
  provider: ModelProvider.MOCK,
  temperature: 0.7,
  maxTokens: 1000,
  timeoutMs: 30_000,
};

/**
 * Base class for HTTP-backed adapters.
 */
export abstract class BaseModel implements ModelInterface {
  abstract readonly name: string;
  protected readonly config: ModelConfig;

  constructor(config: ModelConfig) {
    this.config = config;
  }

  abstract ask(prompt: string): Promise<string>;

  /**
   * POSTs JSON and validates the reply against `schema`.
   *
   * @throws ModelError on network failure, timeout, non-2xx status or an
   *   unexpected response body
   */
  protected async postJson<T>(
    url: string,
    headers: Record<string, string>,
    body: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      throw new ModelError(this.name, `request failed: ${errorMessage(error)}`, null, error);
    }

    if (!res.ok) {
      const errorText = await res.text();
      throw new ModelError(this.name, `API error (${res.status}): ${errorText}`, res.status);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      throw new ModelError(this.name, 'response is not JSON', res.status, error);
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new ModelError(this.name, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, res.status);
    }
    return parsed.data;
  }

  /**
   * API key from config, required by hosted providers.
   */
  protected requireApiKey(envName: string): string {
    const key = this.config.apiKey;
    if (!key) {
      throw new ModelError(this.name, `no API key configured (set ${envName})`);
    }
    return key;
  }
}
