/**
 * Matchflow — AI Backend Interface
 *
 * A backend turns a chunk of items plus criteria into a raw text response.
 * Failures surface as `BackendError`, classified transient or permanent.
 */

import type { Item } from '../../types';
import { BackendError, errorMessage } from '../../lib/errors';
import { DEFAULT_SYSTEM_INSTRUCTIONS } from '../prompt';

export interface AIBackend {
  readonly name: string;
  /** False when credentials or configuration are missing */
  isAvailable(): boolean;
  scoreBatch(items: Item[], criteria: string): Promise<string>;
}

export interface BackendOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Per-request timeout in ms */
  timeoutMs?: number;
  systemInstructions?: string;
}

export interface ResolvedBackendOptions {
  model: string;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  systemInstructions: string;
}

export function resolveBackendOptions(
  options: BackendOptions,
  defaultModel: string
): ResolvedBackendOptions {
  return {
    model: options.model ?? defaultModel,
    maxTokens: options.maxTokens ?? 2000,
    // Low temperature keeps scores consistent between runs
    temperature: options.temperature ?? 0.3,
    timeoutMs: options.timeoutMs ?? 60000,
    systemInstructions: options.systemInstructions ?? DEFAULT_SYSTEM_INSTRUCTIONS,
  };
}

/**
 * Timeouts, throttling, conflicts and server errors are worth retrying;
 * auth, permission and request-shape errors are not.
 */
export function isTransientStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 409 || status === 425 || status === 429 || status >= 500;
}

/**
 * Wrap anything thrown by a client into a `BackendError`.
 */
export function toBackendError(
  backend: string,
  error: unknown,
  transient: boolean
): BackendError {
  if (error instanceof BackendError) return error;
  return new BackendError(backend, errorMessage(error), { transient, cause: error });
}
