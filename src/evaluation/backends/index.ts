/**
 * Matchflow — Backend Registry
 *
 * Builds the backends the fallback chain can name. Cloud backends are only
 * created when their credentials are present in the environment.
 */

import type { MatchflowConfig } from '../../config';
import { logger } from '../../lib/logger';
import type { AIBackend, BackendOptions } from './base';
import { AnthropicBackend } from './anthropic';
import { OllamaBackend } from './ollama';
import { OpenAIBackend } from './openai';

export function createBackends(
  config: Pick<MatchflowConfig, 'llm' | 'system_instructions'>,
  env: NodeJS.ProcessEnv = process.env
): AIBackend[] {
  const shared = (name: string): BackendOptions => ({
    model: config.llm.models[name],
    maxTokens: config.llm.max_tokens,
    temperature: config.llm.temperature,
    timeoutMs: config.llm.timeout_ms,
    systemInstructions: config.system_instructions,
  });

  const backends: AIBackend[] = [];

  if (env.OPENAI_API_KEY) {
    backends.push(new OpenAIBackend({ ...shared('openai'), apiKey: env.OPENAI_API_KEY }));
  }
  if (env.ANTHROPIC_API_KEY) {
    backends.push(new AnthropicBackend({ ...shared('anthropic'), apiKey: env.ANTHROPIC_API_KEY }));
  }
  backends.push(new OllamaBackend({ ...shared('ollama'), baseUrl: env.OLLAMA_BASE_URL }));

  logger.debug('Backends created', { backends: backends.map(b => b.name) });
  return backends;
}

export type { AIBackend, BackendOptions } from './base';
export { isTransientStatus } from './base';
export { AnthropicBackend, DEFAULT_ANTHROPIC_MODEL, isTransientAnthropicError } from './anthropic';
export { OpenAIBackend, DEFAULT_OPENAI_MODEL, isTransientOpenAIError } from './openai';
export { OllamaBackend, DEFAULT_OLLAMA_MODEL, DEFAULT_OLLAMA_BASE_URL } from './ollama';
