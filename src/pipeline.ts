/**
 * Matchflow — Pipeline
 *
 * One end-to-end round:
 * 1. Search all providers (merge, dedup, blocklist)
 * 2. Score the results in batches
 * 3. Keep results at or above the score threshold
 * 4. Track accepted items (skipped on a dry run)
 */

import type { EvaluationResult } from './types';
import type { MatchflowConfig } from './config';
import type { Aggregator } from './aggregator';
import { filterByThreshold, type Evaluator } from './evaluation';
import type { Tracker, TrackResult } from './tracker';
import { logger, timeOperation } from './lib/logger';
import { generateRunId } from './lib/trace';

// ============================================================
// TYPES
// ============================================================

export interface PipelineComponents {
  aggregator: Aggregator;
  evaluator: Evaluator;
  /** Not needed on a dry run */
  tracker?: Tracker;
}

export interface PipelineOptions {
  query: string;
  count: number;
  /** Defaults to `evaluation.criteria` */
  criteria?: string;
  /** Defaults to `evaluation.score_threshold` */
  threshold?: number;
  sortBy?: string;
  dryRun?: boolean;
}

export interface PipelineReport {
  runId: string;
  query: string;
  dryRun: boolean;
  search: {
    fetched: number;
    duplicates: number;
    blocked: number;
    returned: number;
    failedProviders: string[];
  };
  evaluation: {
    scored: number;
    unscored: number;
    accepted: number;
  };
  accepted: EvaluationResult[];
  tracked: TrackResult[];
  durationMs: number;
}

// ============================================================
// RUN
// ============================================================

export async function runPipeline(
  components: PipelineComponents,
  config: MatchflowConfig,
  options: PipelineOptions
): Promise<PipelineReport> {
  const startTime = Date.now();
  const runId = generateRunId('PIPE');
  const dryRun = options.dryRun ?? false;
  const criteria = options.criteria ?? config.evaluation.criteria;
  const threshold = options.threshold ?? config.evaluation.score_threshold;
  const log = logger.child({ runId });

  if (!dryRun && !components.tracker) {
    throw new Error('A tracker is required unless dryRun is set');
  }

  log.info('Pipeline started', { query: options.query, count: options.count, dryRun });

  // Stage 1: search
  const search = await components.aggregator.searchWithReport(options.query, options.count, {
    sortBy: options.sortBy,
  });

  // Stage 2: evaluate
  const results = await timeOperation('Evaluation', () =>
    components.evaluator.batchEvaluate(search.items, criteria, config.evaluation.batch_size)
  );
  const scored = results.filter(r => r.score !== null).length;

  // Stage 3: threshold
  const accepted = filterByThreshold(results, threshold);

  // Stage 4: track
  const tracked: TrackResult[] = [];
  const { tracker } = components;
  if (!dryRun && tracker) {
    await timeOperation('Tracking', async () => {
      for (const result of accepted) {
        tracked.push(await tracker.trackWithResult(result.item));
      }
    });
  }

  const report: PipelineReport = {
    runId,
    query: options.query,
    dryRun,
    search: {
      fetched: search.totalFetched,
      duplicates: search.duplicatesFiltered,
      blocked: search.blockedCount,
      returned: search.items.length,
      failedProviders: search.providerResults
        .filter(p => p.error !== undefined)
        .map(p => p.provider),
    },
    evaluation: {
      scored,
      unscored: results.length - scored,
      accepted: accepted.length,
    },
    accepted,
    tracked,
    durationMs: Date.now() - startTime,
  };

  log.info('Pipeline completed', {
    returned: report.search.returned,
    accepted: report.evaluation.accepted,
    newlyTracked: tracked.filter(t => t.created).length,
    durationMs: report.durationMs,
  });

  return report;
}
