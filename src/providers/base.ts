/**
 * Matchflow — Provider Base
 *
 * Every source of candidate items implements `Provider`. `BaseProvider`
 * supplies validation, normalization and a per-query result cache, so a
 * concrete provider only implements `fetchItems`.
 */

import type { Item, RawItem } from '../types';
import { logger } from '../lib/logger';

export type SearchOptions = Record<string, unknown>;

export interface Provider {
  readonly name: string;
  /** Lower runs earlier in merge order */
  readonly priority: number;
  isEnabled(): boolean;
  search(query: string, count: number, options?: SearchOptions): Promise<Item[]>;
  /** Pre-filter hook; items failing it are dropped by the aggregator */
  validate(item: Item): boolean;
}

export interface BaseProviderOptions {
  enabled?: boolean;
  priority?: number;
  /** Cap on items requested per search, whatever `count` asks for */
  maxResults?: number;
  /** Result cache lifetime; 0 disables the cache */
  cacheTtlMs?: number;
  now?: () => number;
}

interface CacheEntry {
  items: Item[];
  expiresAt: number;
}

export const DEFAULT_CACHE_TTL_MS = 300_000;

export abstract class BaseProvider implements Provider {
  abstract readonly name: string;
  readonly priority: number;

  protected readonly maxResults: number;
  protected logger = logger.child({ provider: this.constructor.name });

  private enabled: boolean;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;
  private readonly cache = new Map<string, CacheEntry>();

  constructor(options: BaseProviderOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.priority = options.priority ?? 100;
    this.maxResults = options.maxResults ?? 50;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fetch raw results from the source. Must be implemented by each provider.
   */
  protected abstract fetchItems(
    query: string,
    count: number,
    options: SearchOptions
  ): Promise<RawItem[]>;

  async search(query: string, count: number, options: SearchOptions = {}): Promise<Item[]> {
    const limit = Math.max(0, Math.min(count, this.maxResults));
    const cacheKey = `${query}\u0000${limit}`;

    const cached = this.getCachedResults(cacheKey);
    if (cached) {
      this.logger.debug('Serving cached results', { query, items: cached.length });
      return cached;
    }

    const raw = await this.fetchItems(query, limit, options);
    const items = raw.slice(0, limit).map(r => this.normalize(r));

    this.cacheResults(cacheKey, items);
    return items;
  }

  validate(item: Item): boolean {
    return Boolean(item.id && item.title && item.link);
  }

  normalize(raw: RawItem): Item {
    return {
      id: raw.id === undefined ? '' : String(raw.id),
      title: (raw.title ?? '').trim(),
      link: (raw.link ?? raw.url ?? '').trim(),
      source: this.name,
      description: raw.description,
      fields: raw.fields ?? {},
    };
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private cacheResults(key: string, items: Item[]): void {
    if (this.cacheTtlMs <= 0) return;
    this.cache.set(key, { items, expiresAt: this.now() + this.cacheTtlMs });
  }

  private getCachedResults(key: string): Item[] | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (this.now() > entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }
    return entry.items;
  }
}
