/**
 * Matchflow — Hacker News Provider
 *
 * Full-text story search through the public Algolia HN API.
 */

import { z } from 'zod';
import type { RawItem } from '../types';
import { ProviderError } from '../lib/errors';
import { BaseProvider, type BaseProviderOptions } from './base';

const HN_SEARCH_API = 'https://hn.algolia.com/api/v1/search';
const HN_ITEM_URL = 'https://news.ycombinator.com/item?id=';

const HNHitSchema = z.object({
  objectID: z.string(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  story_text: z.string().nullish(),
  author: z.string().nullish(),
  points: z.number().nullish(),
  num_comments: z.number().nullish(),
  created_at: z.string().nullish(),
});
type HNHit = z.infer<typeof HNHitSchema>;

const HNSearchResponseSchema = z.object({
  hits: z.array(HNHitSchema),
});

export interface HackerNewsProviderOptions extends BaseProviderOptions {
  /** Drop stories below this score */
  minPoints?: number;
  baseUrl?: string;
}

export class HackerNewsProvider extends BaseProvider {
  readonly name = 'hacker_news';

  private readonly minPoints: number;
  private readonly baseUrl: string;

  constructor(options: HackerNewsProviderOptions = {}) {
    super(options);
    this.minPoints = options.minPoints ?? 0;
    this.baseUrl = options.baseUrl ?? HN_SEARCH_API;
  }

  protected async fetchItems(query: string, count: number): Promise<RawItem[]> {
    const params = new URLSearchParams({
      query,
      tags: 'story',
      hitsPerPage: String(count),
    });

    const res = await fetch(`${this.baseUrl}?${params.toString()}`);
    if (!res.ok) {
      throw new ProviderError(this.name, `HN search returned HTTP ${res.status}`);
    }

    const parsed = HNSearchResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new ProviderError(this.name, 'Unexpected HN search response shape');
    }
    const body = parsed.data;

    return body.hits
      .filter(hit => (hit.points ?? 0) >= this.minPoints)
      .map(hit => this.toRawItem(hit));
  }

  private toRawItem(hit: HNHit): RawItem {
    return {
      id: hit.objectID,
      title: hit.title ?? undefined,
      link: hit.url ?? `${HN_ITEM_URL}${hit.objectID}`,
      description: hit.story_text ?? undefined,
      fields: {
        author: hit.author ?? undefined,
        points: hit.points ?? 0,
        comments: hit.num_comments ?? 0,
        publishedAt: hit.created_at ?? undefined,
      },
    };
  }
}
