/**
 * Matchflow — Anthropic Backend
 *
 * Scores a chunk with a single Messages API call. The SDK's own retries
 * are disabled; the evaluator's retry policy owns that concern.
 */

import Anthropic from '@anthropic-ai/sdk';
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

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-haiku-20241022';

export interface AnthropicBackendOptions extends BackendOptions {
  apiKey?: string;
}

export function isTransientAnthropicError(error: unknown): boolean {
  if (error instanceof Anthropic.APIConnectionError) return true;
  if (error instanceof Anthropic.APIError) return isTransientStatus(error.status);
  return true;
}

export class AnthropicBackend implements AIBackend {
  readonly name = 'anthropic';

  private readonly apiKey: string | undefined;
  private readonly options: ResolvedBackendOptions;
  private client: Anthropic | null = null;

  constructor(options: AnthropicBackendOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
    this.options = resolveBackendOptions(options, DEFAULT_ANTHROPIC_MODEL);
  }

  isAvailable(): boolean {
    return Boolean(this.apiKey);
  }

  async scoreBatch(items: Item[], criteria: string): Promise<string> {
    const { system, user } = buildScoringPrompt(items, criteria, this.options.systemInstructions);

    try {
      const response = await this.getClient().messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          system,
          messages: [{ role: 'user', content: user }],
        },
        { timeout: this.options.timeoutMs, maxRetries: 0 }
      );

      const textContent = response.content.find(c => c.type === 'text');
      if (!textContent || textContent.type !== 'text') {
        throw new BackendError(this.name, 'No text content in response', { transient: true });
      }
      return textContent.text;
    } catch (error) {
      throw toBackendError(this.name, error, isTransientAnthropicError(error));
    }
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.apiKey) {
        throw new BackendError(this.name, 'ANTHROPIC_API_KEY not set', { transient: false });
      }
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }
}
