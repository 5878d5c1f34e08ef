/**
 * Matchflow — Evaluator
 *
 * Scores items in fixed-size chunks. Each chunk walks the fallback chain
 * in order, one backend at a time; every backend call is rate-limited and
 * retried with exponential backoff. The result list always has one entry
 * per input item, in input order: a chunk no backend could score comes back
 * with null scores and the collected reasons.
 */

import type {
  BackendAttempt,
  ChunkOutcome,
  EvaluationResult,
  Item,
} from '../types';
import { BackendError, errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';
import { systemClock, TokenBucket, type Clock } from '../lib/rate-limiter';
import { RetryPolicy, withTimeout, type RetryPolicyOptions } from '../lib/retry';
import { SerialQueue } from '../lib/serial';
import { generateRunId } from '../lib/trace';
import type { AIBackend } from './backends/base';
import { parseScores } from './parser';

// ============================================================
// CONFIGURATION
// ============================================================

export interface EvaluatorOptions {
  backends: AIBackend[];
  /** Backend names in the order to try; defaults to the order of `backends` */
  fallbackChain?: string[];
  retry?: RetryPolicyOptions;
  /** null disables rate limiting */
  rateLimit?: { callsPerSecond: number } | null;
  batchSize?: number;
  /** Hard cap on a single backend call, on top of the backend's own timeout */
  callTimeoutMs?: number;
  clock?: Clock;
}

export interface EvaluationReport {
  runId: string;
  results: EvaluationResult[];
  chunks: ChunkOutcome[];
  durationMs: number;
}

const DEFAULT_BATCH_SIZE = 10;

interface BackendLane {
  backend: AIBackend;
  queue: SerialQueue;
  limiter: TokenBucket | null;
}

// ============================================================
// HELPERS
// ============================================================

export function chunkItems<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Keep results with a score at or above the threshold.
 */
export function filterByThreshold(
  results: EvaluationResult[],
  threshold: number
): EvaluationResult[] {
  return results.filter(r => r.score !== null && r.score >= threshold);
}

function reasonOf(error: unknown): string {
  return error instanceof BackendError ? error.reason : errorMessage(error);
}

// ============================================================
// EVALUATOR
// ============================================================

export class Evaluator {
  readonly fallbackChain: string[];

  private readonly lanes = new Map<string, BackendLane>();
  private readonly retryPolicy: RetryPolicy;
  private readonly batchSize: number;
  private readonly callTimeoutMs: number | undefined;
  private readonly log = logger.child({ component: 'evaluator' });

  constructor(options: EvaluatorOptions) {
    const clock = options.clock ?? systemClock;
    const rateLimit = options.rateLimit ?? null;

    for (const backend of options.backends) {
      this.lanes.set(backend.name, {
        backend,
        queue: new SerialQueue(),
        limiter: rateLimit ? new TokenBucket({ ratePerSecond: rateLimit.callsPerSecond }, clock) : null,
      });
    }

    this.fallbackChain = options.fallbackChain ?? options.backends.map(b => b.name);
    this.retryPolicy = new RetryPolicy(options.retry, clock.sleep);
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.callTimeoutMs = options.callTimeoutMs;
  }

  /**
   * Score every item. Never throws for a positive integer batch size.
   */
  async batchEvaluate(
    items: Item[],
    criteria: string,
    batchSize: number = this.batchSize
  ): Promise<EvaluationResult[]> {
    const report = await this.batchEvaluateWithReport(items, criteria, batchSize);
    return report.results;
  }

  async batchEvaluateWithReport(
    items: Item[],
    criteria: string,
    batchSize: number = this.batchSize
  ): Promise<EvaluationReport> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
    }

    const startTime = Date.now();
    const runId = generateRunId('EVAL');
    const chunks = chunkItems(items, batchSize);

    this.log.info('Starting batch evaluation', {
      runId,
      items: items.length,
      chunks: chunks.length,
      chain: this.fallbackChain,
    });

    const results: EvaluationResult[] = [];
    const outcomes: ChunkOutcome[] = [];

    for (const [chunkIndex, chunk] of chunks.entries()) {
      const { results: chunkResults, outcome } = await this.evaluateChunk(chunk, criteria, chunkIndex, runId);
      results.push(...chunkResults);
      outcomes.push(outcome);
    }

    const scored = results.filter(r => r.score !== null).length;
    const durationMs = Date.now() - startTime;

    this.log.info('Batch evaluation completed', {
      runId,
      total: results.length,
      scored,
      failed: results.length - scored,
      durationMs,
    });

    return { runId, results, chunks: outcomes, durationMs };
  }

  private async evaluateChunk(
    chunk: Item[],
    criteria: string,
    chunkIndex: number,
    runId: string
  ): Promise<{ results: EvaluationResult[]; outcome: ChunkOutcome }> {
    const attempts: BackendAttempt[] = [];

    for (const name of this.fallbackChain) {
      const lane = this.lanes.get(name);
      if (!lane) {
        attempts.push({ backend: name, succeeded: false, tries: 0, error: 'not configured' });
        continue;
      }
      if (!lane.backend.isAvailable()) {
        attempts.push({ backend: name, succeeded: false, tries: 0, error: 'not available' });
        continue;
      }

      try {
        const { raw, tries } = await this.callBackend(lane, chunk, criteria, runId);
        attempts.push({ backend: name, succeeded: true, tries });

        return {
          results: this.toResults(chunk, raw, name, runId, chunkIndex),
          outcome: { chunkIndex, size: chunk.length, providerUsed: name, attempts },
        };
      } catch (error) {
        const tries = error instanceof AttemptsExhausted ? error.tries : 1;
        const reason = reasonOf(error instanceof AttemptsExhausted ? error.cause : error);
        attempts.push({ backend: name, succeeded: false, tries, error: reason });

        this.log.warn('Backend failed, falling back', {
          runId,
          chunkIndex,
          backend: name,
          tries,
          error: reason,
        });
      }
    }

    const summary = attempts.length > 0
      ? attempts.map(a => `${a.backend}: ${a.error ?? 'failed'}`).join('; ')
      : 'fallback chain is empty';
    const error = `All backends failed: ${summary}`;

    this.log.error('Chunk could not be scored', { runId, chunkIndex, size: chunk.length, error });

    return {
      results: chunk.map(item => ({ item, score: null, providerUsed: null, error })),
      outcome: { chunkIndex, size: chunk.length, providerUsed: null, attempts },
    };
  }

  /**
   * One backend, serialized per lane: rate-limit, call, retry transient errors.
   */
  private callBackend(
    lane: BackendLane,
    chunk: Item[],
    criteria: string,
    runId: string
  ): Promise<{ raw: string; tries: number }> {
    const { backend } = lane;

    return lane.queue.run(async () => {
      let tries = 0;
      try {
        const raw = await this.retryPolicy.execute(
          async (attempt) => {
            tries = attempt;
            if (lane.limiter) {
              const waitedMs = await lane.limiter.acquire();
              if (waitedMs > 0) {
                this.log.debug('Rate limited', { backend: backend.name, waitedMs });
              }
            }
            return this.invoke(backend, chunk, criteria);
          },
          {
            shouldRetry: (error) => !(error instanceof BackendError) || error.transient,
            onRetry: ({ error, attempt, delayMs }) =>
              this.log.warn('Backend call failed, retrying', {
                runId,
                backend: backend.name,
                attempt,
                delayMs,
                error: reasonOf(error),
              }),
          }
        );
        return { raw, tries };
      } catch (error) {
        throw new AttemptsExhausted(tries, error);
      }
    });
  }

  private invoke(backend: AIBackend, chunk: Item[], criteria: string): Promise<string> {
    const call = backend.scoreBatch(chunk, criteria);
    if (this.callTimeoutMs === undefined) return call;

    return withTimeout(call, this.callTimeoutMs, backend.name).catch((error: unknown) => {
      throw error instanceof BackendError
        ? error
        : new BackendError(backend.name, errorMessage(error), { transient: true, cause: error });
    });
  }

  private toResults(
    chunk: Item[],
    raw: string,
    backendName: string,
    runId: string,
    chunkIndex: number
  ): EvaluationResult[] {
    const parsed = parseScores(raw, chunk.length);

    if (!parsed) {
      this.log.warn('No score array in response', { runId, chunkIndex, backend: backendName });
      return chunk.map((item, index) => ({
        item,
        score: null,
        providerUsed: backendName,
        error: `Item ${index}: no score array in response`,
      }));
    }

    return chunk.map((item, index) => {
      const entry = parsed[index];
      if (entry.ok) {
        return { item, score: entry.score, providerUsed: backendName };
      }

      this.log.debug('Score parse failure', {
        runId,
        chunkIndex,
        backend: backendName,
        error: entry.error.message,
      });
      return { item, score: null, providerUsed: backendName, error: entry.error.message };
    });
  }
}

/**
 * Carries the try count out of the retry loop alongside the last error.
 */
class AttemptsExhausted extends Error {
  readonly tries: number;

  constructor(tries: number, cause: unknown) {
    super(errorMessage(cause), { cause });
    this.tries = tries;
  }
}
