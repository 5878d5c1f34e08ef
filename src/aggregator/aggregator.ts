/**
 * Matchflow — Aggregator
 *
 * Runs one search round across all enabled providers:
 * 1. Query every provider in parallel, each call isolated with a timeout
 * 2. Merge results in provider priority order
 * 3. Drop items that fail the provider's validate hook
 * 4. Deduplicate (first-seen wins)
 * 5. Apply the blocklist
 * 6. Optionally sort, then truncate to `count`
 *
 * A failing provider is logged and left out of the round. Only when every
 * provider fails does the search throw.
 */

import type { BlockRule, Item } from '../types';
import type { Provider, SearchOptions } from '../providers';
import {
  AggregationError,
  ProviderError,
  errorMessage,
  type ProviderFailure,
} from '../lib/errors';
import { logger } from '../lib/logger';
import { withTimeout } from '../lib/retry';
import { generateRunId } from '../lib/trace';
import { applyBlocklist, deduplicateItems, sortItems, type DedupOptions } from './filter';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorOptions {
  /** Default blocklist; a blocklist passed to `search` replaces it */
  blocklist?: BlockRule[];
  dedup?: DedupOptions;
  /** Timeout per provider call in ms */
  providerTimeoutMs?: number;
}

export interface SearchRequest {
  blocklist?: BlockRule[];
  /** `field` sorts descending, `-field` ascending */
  sortBy?: string;
  providerOptions?: SearchOptions;
}

export interface ProviderRoundResult {
  provider: string;
  priority: number;
  itemCount: number;
  invalidCount: number;
  durationMs: number;
  error?: string;
}

export interface SearchReport {
  runId: string;
  items: Item[];
  providerResults: ProviderRoundResult[];
  totalFetched: number;
  duplicatesFiltered: number;
  blockedCount: number;
  durationMs: number;
}

const DEFAULT_PROVIDER_TIMEOUT_MS = 30000;

interface ProviderOutcome {
  result: ProviderRoundResult;
  items: Item[];
}

// ============================================================
// AGGREGATOR
// ============================================================

export class Aggregator {
  private readonly providers: Provider[];
  private readonly blocklist: BlockRule[];
  private readonly dedup: DedupOptions;
  private readonly providerTimeoutMs: number;
  private readonly log = logger.child({ component: 'aggregator' });

  constructor(providers: Provider[], options: AggregatorOptions = {}) {
    // Stable sort keeps registration order among equal priorities.
    this.providers = [...providers].sort((a, b) => a.priority - b.priority);
    this.blocklist = options.blocklist ?? [];
    this.dedup = options.dedup ?? {};
    this.providerTimeoutMs = options.providerTimeoutMs ?? DEFAULT_PROVIDER_TIMEOUT_MS;
  }

  /**
   * Search across providers and return at most `count` filtered items.
   */
  async search(query: string, count: number, blocklist?: BlockRule[]): Promise<Item[]> {
    const report = await this.searchWithReport(query, count, { blocklist });
    return report.items;
  }

  async searchWithReport(
    query: string,
    count: number,
    request: SearchRequest = {}
  ): Promise<SearchReport> {
    const startTime = Date.now();
    const runId = generateRunId('SRCH');
    const enabled = this.providers.filter(p => p.isEnabled());

    this.log.info('Starting search', { runId, query, count, providers: enabled.length });

    if (enabled.length === 0) {
      throw new AggregationError([]);
    }

    // Parallel calls; Promise.all keeps the priority order of `enabled`.
    const outcomes = await Promise.all(
      enabled.map(provider => this.queryProvider(provider, query, count, request.providerOptions))
    );

    const failures: ProviderFailure[] = outcomes
      .filter(o => o.result.error !== undefined)
      .map(o => ({ provider: o.result.provider, error: o.result.error ?? 'unknown error' }));

    if (failures.length === outcomes.length) {
      this.log.error('All providers failed', { runId, failures });
      throw new AggregationError(failures);
    }

    const merged = outcomes.flatMap(o => o.items);
    const deduped = deduplicateItems(merged, this.dedup);
    const filtered = applyBlocklist(deduped.items, request.blocklist ?? this.blocklist);

    for (const { item, rule } of filtered.blocked) {
      this.log.debug('Blocked item', { title: item.title, rule: `${rule.type}:${rule.value}` });
    }

    const ordered = request.sortBy ? sortItems(filtered.items, request.sortBy) : filtered.items;
    const items = ordered.slice(0, Math.max(0, count));

    const report: SearchReport = {
      runId,
      items,
      providerResults: outcomes.map(o => o.result),
      totalFetched: merged.length,
      duplicatesFiltered: deduped.duplicateCount,
      blockedCount: filtered.blocked.length,
      durationMs: Date.now() - startTime,
    };

    this.log.info('Search completed', {
      runId,
      fetched: report.totalFetched,
      duplicates: report.duplicatesFiltered,
      blocked: report.blockedCount,
      returned: items.length,
      failedProviders: failures.length,
      durationMs: report.durationMs,
    });

    return report;
  }

  private async queryProvider(
    provider: Provider,
    query: string,
    count: number,
    options: SearchOptions = {}
  ): Promise<ProviderOutcome> {
    const startTime = Date.now();

    try {
      const results = await withTimeout(
        provider.search(query, count, options),
        this.providerTimeoutMs,
        provider.name
      );

      const items: Item[] = [];
      let invalidCount = 0;
      for (const item of results) {
        if (provider.validate(item)) {
          items.push({ ...item, source: item.source || provider.name });
        } else {
          invalidCount++;
          this.log.debug('Invalid item dropped', { provider: provider.name, id: item.id });
        }
      }

      const durationMs = Date.now() - startTime;
      this.log.info('Provider search completed', {
        provider: provider.name,
        items: items.length,
        invalid: invalidCount,
        durationMs,
      });

      return {
        items,
        result: {
          provider: provider.name,
          priority: provider.priority,
          itemCount: items.length,
          invalidCount,
          durationMs,
        },
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const message = error instanceof ProviderError ? error.reason : errorMessage(error);

      this.log.warn('Provider search failed', {
        provider: provider.name,
        error: message,
        durationMs,
      });

      return {
        items: [],
        result: {
          provider: provider.name,
          priority: provider.priority,
          itemCount: 0,
          invalidCount: 0,
          durationMs,
          error: message,
        },
      };
    }
  }
}
