/**
 * Matchflow — Fingerprints
 *
 * Identity keys for items: a hash of the normalized URL, or of the
 * normalized title and description when an item has no link.
 * The aggregator dedups on them and the tracker keys records by them.
 */

import crypto from 'crypto';
import type { Fingerprint, Item } from '../types';

const TRACKING_PARAM = /^(utm_.+|ref|fbclid|gclid)$/i;

/**
 * Normalize a URL for comparison.
 *
 * Drops scheme, `www.`, fragment, trailing slashes and tracking parameters;
 * lower-cases the host; sorts the remaining query parameters.
 */
export function normalizeUrl(url: string): string {
  const trimmed = url.trim();
  try {
    const parsed = new URL(trimmed);
    const host = parsed.hostname.toLowerCase().replace(/^www\./, '');
    const port = parsed.port ? `:${parsed.port}` : '';
    const path = parsed.pathname.replace(/\/+$/, '');

    const params = [...parsed.searchParams.entries()]
      .filter(([key]) => !TRACKING_PARAM.test(key))
      .sort(([a, av], [b, bv]) => (a === b ? compare(av, bv) : compare(a, b)));
    const query = params.length > 0 ? `?${new URLSearchParams(params).toString()}` : '';

    return `${host}${port}${path}${query}`;
  } catch {
    return trimmed.toLowerCase().replace(/\/+$/, '');
  }
}

function compare(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/\s+/g, ' ').trim();
}

function hashKey(value: string): string {
  return crypto.createHash('sha256').update(value).digest('hex').slice(0, 16);
}

export function urlFingerprint(url: string): Fingerprint {
  return hashKey(`url:${normalizeUrl(url)}`);
}

export function contentFingerprint(title: string, description = ''): Fingerprint {
  return hashKey(`content:${normalizeText(title)}|${normalizeText(description)}`);
}

/**
 * The item's identity: URL-based when it has a link, content-based otherwise.
 */
export function fingerprintItem(item: Pick<Item, 'link' | 'title' | 'description'>): Fingerprint {
  if (item.link.trim()) {
    return urlFingerprint(item.link);
  }
  return contentFingerprint(item.title, item.description);
}

// ============================================================
// SIMILARITY
// ============================================================

export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter(token => token.length >= 2)
  );
}

/**
 * Jaccard similarity of the two texts' token sets, in [0, 1].
 */
export function tokenSetSimilarity(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);

  if (tokensA.size === 0 && tokensB.size === 0) return 1;
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  let intersection = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) intersection++;
  }
  const union = tokensA.size + tokensB.size - intersection;

  return intersection / union;
}

export function itemSimilarity(
  a: Pick<Item, 'title' | 'description'>,
  b: Pick<Item, 'title' | 'description'>
): number {
  return tokenSetSimilarity(
    `${a.title} ${a.description ?? ''}`,
    `${b.title} ${b.description ?? ''}`
  );
}
