/**
 * Matchflow — Evaluation Module
 */

import type { MatchflowConfig } from '../config';
import { createBackends, type AIBackend } from './backends';
import { Evaluator } from './evaluator';

/**
 * The configured default backend goes first, followed by the rest of the
 * fallback chain in order, without repeats.
 */
export function resolveFallbackChain(llm: MatchflowConfig['llm']): string[] {
  const chain = [llm.default_provider, ...llm.fallback_chain].filter(name => name.length > 0);
  return [...new Set(chain)];
}

export function createEvaluator(
  config: MatchflowConfig,
  backends: AIBackend[] = createBackends(config)
): Evaluator {
  const { rate_limiting: rateLimiting } = config;

  return new Evaluator({
    backends,
    fallbackChain: resolveFallbackChain(config.llm),
    retry: {
      maxAttempts: rateLimiting.retry_attempts,
      baseDelayMs: rateLimiting.retry_delay_seconds * 1000,
    },
    rateLimit: rateLimiting.enabled ? { callsPerSecond: rateLimiting.calls_per_second } : null,
    batchSize: config.evaluation.batch_size,
  });
}

export {
  Evaluator,
  chunkItems,
  filterByThreshold,
  type EvaluatorOptions,
  type EvaluationReport,
} from './evaluator';
export { parseScores, extractScoreArray, toScore, SCORE_EPSILON, type ParsedScore } from './parser';
export { buildScoringPrompt, DEFAULT_SYSTEM_INSTRUCTIONS, type ScoringPrompt } from './prompt';
export * from './backends';
