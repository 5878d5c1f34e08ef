/**
 * Matchflow — Ollama Backend
 *
 * Local models through Ollama's /api/generate endpoint. No credentials;
 * connection failures are transient.
 */

import { z } from 'zod';
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

export const DEFAULT_OLLAMA_MODEL = 'qwen2.5:32b';
export const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

const GenerateResponseSchema = z.object({
  response: z.string(),
});

export interface OllamaBackendOptions extends BackendOptions {
  baseUrl?: string;
  enabled?: boolean;
}

export class OllamaBackend implements AIBackend {
  readonly name = 'ollama';

  private readonly baseUrl: string;
  private readonly enabled: boolean;
  private readonly options: ResolvedBackendOptions;

  constructor(options: OllamaBackendOptions = {}) {
    this.baseUrl = (options.baseUrl ?? process.env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_BASE_URL)
      .replace(/\/+$/, '');
    this.enabled = options.enabled ?? true;
    this.options = resolveBackendOptions(options, DEFAULT_OLLAMA_MODEL);
  }

  isAvailable(): boolean {
    return this.enabled;
  }

  async scoreBatch(items: Item[], criteria: string): Promise<string> {
    const { system, user } = buildScoringPrompt(items, criteria, this.options.systemInstructions);

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/api/generate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          system,
          prompt: user,
          stream: false,
          options: {
            num_predict: this.options.maxTokens,
            temperature: this.options.temperature,
          },
        }),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      // Connection refused, DNS failure or timeout
      throw toBackendError(this.name, error, true);
    }

    if (!res.ok) {
      throw new BackendError(this.name, `HTTP ${res.status}`, {
        transient: isTransientStatus(res.status),
      });
    }

    const parsed = GenerateResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new BackendError(this.name, 'Unexpected response shape', { transient: true });
    }
    return parsed.data.response;
  }
}
