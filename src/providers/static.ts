/**
 * Matchflow — Static Provider
 *
 * Serves a fixed list of items. Used for offline runs, fixtures and
 * sources exported to a file by some other tool.
 */

import type { RawItem } from '../types';
import { BaseProvider, type BaseProviderOptions } from './base';

export class StaticProvider extends BaseProvider {
  readonly name: string;
  private readonly items: RawItem[];

  constructor(name: string, items: RawItem[], options: BaseProviderOptions = {}) {
    super({ cacheTtlMs: 0, ...options });
    this.name = name;
    this.items = items;
  }

  protected async fetchItems(_query: string, count: number): Promise<RawItem[]> {
    return this.items.slice(0, count);
  }
}
