/**
 * Matchflow — OpenAI Backend
 */

import OpenAI from 'openai';
import type { Item } from '../../types';
import { BackendError } from '../../lib/errors';
import { buildScoringPrompt } from '../prompt';
import {
  isTransientStatus,
  resolveBackendOptions,
  toBackendError,
  type AIBackend,
  type BackendOptions,
  type ResolvedBackendOptions,
} from './base';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o-mini';

export interface OpenAIBackendOptions extends BackendOptions {
  apiKey?: string;
  baseURL?: string;
}

export function isTransientOpenAIError(error: unknown): boolean {
  if (error instanceof OpenAI.APIConnectionError) return true;
  if (error instanceof OpenAI.APIError) return isTransientStatus(error.status);
  return true;
}

export class OpenAIBackend implements AIBackend {
  readonly name = 'openai';

  private readonly apiKey: string | undefined;
  private readonly baseURL: string | undefined;
  private readonly options: ResolvedBackendOptions;
  private client: OpenAI | null = null;

  constructor(options: OpenAIBackendOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.OPENAI_API_KEY;
    this.baseURL = options.baseURL;
    this.options = resolveBackendOptions(options, DEFAULT_OPENAI_MODEL);
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async scoreBatch(items: Item[], criteria: string): Promise<string> {
    const { system, user } = buildScoringPrompt(items, criteria, this.options.systemInstructions);

    try {
      const completion = await this.getClient().chat.completions.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          messages: [
            { role: 'system', content: system },
            { role: 'user', content: user },
          ],
        },
        { timeout: this.options.timeoutMs, maxRetries: 0 }
      );

      const content = completion.choices[0]?.message.content;
      if (!content) {
        throw new BackendError(this.name, 'Empty completion', { transient: true });
      }
      return content;
    } catch (error) {
      throw toBackendError(this.name, error, isTransientOpenAIError(error));
    }
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.apiKey) {
        throw new BackendError(this.name, 'OPENAI_API_KEY not set', { transient: false });
      }
      this.client = new OpenAI({ apiKey: this.apiKey, baseURL: this.baseURL });
    }
    return this.client;
  }
}
