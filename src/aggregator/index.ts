/**
 * Matchflow — Aggregator Module
 */

import type { MatchflowConfig } from '../config';
import { createProviders, type Provider } from '../providers';
import { Aggregator } from './aggregator';

export function createAggregator(
  config: MatchflowConfig,
  providers: Provider[] = createProviders(config)
): Aggregator {
  return new Aggregator(providers, {
    blocklist: config.blocked_entities,
    dedup: {
      enabled: config.deduplication.enabled,
      method: config.deduplication.method,
      similarityThreshold: config.deduplication.similarity_threshold,
    },
  });
}

export {
  Aggregator,
  type AggregatorOptions,
  type SearchRequest,
  type SearchReport,
  type ProviderRoundResult,
} from './aggregator';
export {
  deduplicateItems,
  applyBlocklist,
  matchesRule,
  findBlockingRule,
  sortItems,
  DEFAULT_SIMILARITY_THRESHOLD,
  type DedupOptions,
  type DedupResult,
  type BlocklistResult,
} from './filter';
