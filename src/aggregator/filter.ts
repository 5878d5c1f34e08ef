/**
 * Matchflow — Dedup & Blocklist Filters
 *
 * Pure functions applied by the aggregator after merging provider results.
 */

import type { BlockRule, DedupMethod, Item } from '../types';
import { contentFingerprint, fingerprintItem, itemSimilarity } from '../lib/fingerprint';

// ============================================================
// DEDUPLICATION
// ============================================================

export interface DedupOptions {
  enabled?: boolean;
  method?: DedupMethod;
  /** Fuzzy threshold for the `content` method */
  similarityThreshold?: number;
}

export interface DedupResult {
  items: Item[];
  duplicateCount: number;
}

export const DEFAULT_SIMILARITY_THRESHOLD = 0.85;

/**
 * Collapse duplicates, keeping the first-seen item.
 *
 * Matching fingerprints and identical normalized title/description always
 * collapse. With the `content` method, items whose title/description
 * similarity reaches the threshold collapse too.
 */
export function deduplicateItems(items: Item[], options: DedupOptions = {}): DedupResult {
  const {
    enabled = true,
    method = 'url',
    similarityThreshold = DEFAULT_SIMILARITY_THRESHOLD,
  } = options;

  if (!enabled) {
    return { items: [...items], duplicateCount: 0 };
  }

  const seen = new Set<string>();
  const seenContent = new Set<string>();
  const kept: Item[] = [];

  for (const item of items) {
    const key = fingerprintItem(item);
    if (seen.has(key)) continue;

    const contentKey = contentFingerprint(item.title, item.description);
    if (seenContent.has(contentKey)) continue;

    if (method === 'content' && kept.some(k => itemSimilarity(k, item) >= similarityThreshold)) {
      continue;
    }

    seen.add(key);
    seenContent.add(contentKey);
    kept.push(item);
  }

  return { items: kept, duplicateCount: items.length - kept.length };
}

// ============================================================
// BLOCKLIST
// ============================================================

function employerOf(item: Item): string {
  const { company, employer } = item.fields;
  const parts = [company, employer].filter((v): v is string => typeof v === 'string');
  return parts.join(' ');
}

export function matchesRule(item: Item, rule: BlockRule): boolean {
  const needle = rule.value.toLowerCase();
  if (!needle) return false;

  switch (rule.type) {
    case 'site':
      return item.link.toLowerCase().includes(needle) || item.source.toLowerCase().includes(needle);
    case 'employer':
      return employerOf(item).toLowerCase().includes(needle);
    case 'keyword':
      return (
        item.title.toLowerCase().includes(needle) ||
        (item.description ?? '').toLowerCase().includes(needle)
      );
  }
}

export function findBlockingRule(item: Item, rules: BlockRule[]): BlockRule | undefined {
  return rules.find(rule => matchesRule(item, rule));
}

export interface BlocklistResult {
  items: Item[];
  blocked: Array<{ item: Item; rule: BlockRule }>;
}

export function applyBlocklist(items: Item[], rules: BlockRule[]): BlocklistResult {
  const kept: Item[] = [];
  const blocked: BlocklistResult['blocked'] = [];

  for (const item of items) {
    const rule = findBlockingRule(item, rules);
    if (rule) {
      blocked.push({ item, rule });
    } else {
      kept.push(item);
    }
  }

  return { items: kept, blocked };
}

// ============================================================
// SORTING
// ============================================================

function sortValue(item: Item, field: string): unknown {
  if (field === 'title' || field === 'link' || field === 'source' || field === 'id') {
    return item[field];
  }
  return item.fields[field];
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

/**
 * Sort by a field: `points` sorts descending, `-points` ascending.
 * Items without the field keep their relative order at the end.
 */
export function sortItems(items: Item[], sortBy: string): Item[] {
  const ascending = sortBy.startsWith('-');
  const field = ascending ? sortBy.slice(1) : sortBy;

  const withValue = items.filter(item => sortValue(item, field) !== undefined);
  const withoutValue = items.filter(item => sortValue(item, field) === undefined);

  const sorted = [...withValue].sort((a, b) => {
    const order = compareValues(sortValue(a, field), sortValue(b, field));
    return ascending ? order : -order;
  });

  return [...sorted, ...withoutValue];
}
