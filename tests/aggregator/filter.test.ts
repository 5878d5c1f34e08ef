/**
 * Tests for dedup, blocklist and sort filters
 */

import { describe, it, expect } from 'vitest';
import {
  deduplicateItems,
  applyBlocklist,
  matchesRule,
  findBlockingRule,
  sortItems,
} from '../../src/aggregator/filter';
import type { BlockRule } from '../../src/types';
import { makeItem } from '../helpers/fixtures';

describe('Filters', () => {
  describe('deduplicateItems', () => {
    it('should collapse items with the same normalized URL, keeping the first', () => {
      const first = makeItem({ id: 'a', link: 'https://www.example.com/job/1?utm_source=hn', source: 'one' });
      const second = makeItem({ id: 'b', link: 'http://example.com/job/1/', source: 'two' });

      const result = deduplicateItems([first, second]);

      expect(result.items).toEqual([first]);
      expect(result.duplicateCount).toBe(1);
    });

    it('should keep items with different URLs under the url method', () => {
      const items = [
        makeItem({ id: 'a', link: 'https://example.com/1', title: 'Rust Engineer' }),
        makeItem({ id: 'b', link: 'https://example.com/2', title: 'Go Engineer' }),
      ];

      expect(deduplicateItems(items, { method: 'url' }).items).toHaveLength(2);
    });

    it('should collapse identical title and description under the url method', () => {
      const items = [
        makeItem({ id: 'a', link: 'https://a.example.com/1', title: 'Rust Engineer', description: 'Remote role' }),
        makeItem({ id: 'b', link: 'https://b.example.com/9', title: '  RUST engineer ', description: 'remote   role' }),
        makeItem({ id: 'c', link: 'https://c.example.com/3', title: 'Rust Engineer', description: 'Onsite role' }),
      ];

      const result = deduplicateItems(items, { method: 'url' });

      expect(result.items.map(i => i.id)).toEqual(['a', 'c']);
      expect(result.duplicateCount).toBe(1);
    });

    it('should collapse near-identical text under the content method', () => {
      const items = [
        makeItem({ id: 'a', link: 'https://a.example.com/1', title: 'Senior Rust Engineer', description: 'Remote backend role' }),
        makeItem({ id: 'b', link: 'https://b.example.com/1', title: 'Senior Rust Engineer!', description: 'remote backend role' }),
      ];

      const result = deduplicateItems(items, { method: 'content', similarityThreshold: 0.85 });

      expect(result.items.map(i => i.id)).toEqual(['a']);
      expect(result.duplicateCount).toBe(1);
    });

    it('should keep items whose similarity is below the threshold', () => {
      const items = [
        makeItem({ id: 'a', link: 'https://a.example.com/1', title: 'Rust Engineer', description: 'Remote' }),
        makeItem({ id: 'b', link: 'https://b.example.com/1', title: 'Rust Developer', description: 'Onsite' }),
      ];

      const result = deduplicateItems(items, { method: 'content', similarityThreshold: 0.85 });

      expect(result.items.map(i => i.id)).toEqual(['a', 'b']);
    });

    it('should return everything when disabled', () => {
      const item = makeItem();
      const result = deduplicateItems([item, item], { enabled: false });

      expect(result.items).toHaveLength(2);
      expect(result.duplicateCount).toBe(0);
    });
  });

  describe('matchesRule', () => {
    const item = makeItem({
      title: 'Backend Engineer',
      link: 'https://careers.spam.com/jobs/7',
      source: 'hacker_news',
      description: 'Unpaid internship',
      fields: { company: 'Acme Corp' },
    });

    it('should match site rules against the link', () => {
      expect(matchesRule(item, { type: 'site', value: 'SPAM.com' })).toBe(true);
    });

    it('should match site rules against the source', () => {
      expect(matchesRule(item, { type: 'site', value: 'hacker_news' })).toBe(true);
    });

    it('should match employer rules against company fields', () => {
      expect(matchesRule(item, { type: 'employer', value: 'acme' })).toBe(true);
      expect(matchesRule(item, { type: 'employer', value: 'globex' })).toBe(false);
    });

    it('should match keyword rules against title and description', () => {
      expect(matchesRule(item, { type: 'keyword', value: 'backend' })).toBe(true);
      expect(matchesRule(item, { type: 'keyword', value: 'unpaid' })).toBe(true);
      expect(matchesRule(item, { type: 'keyword', value: 'frontend' })).toBe(false);
    });

    it('should not match employer rules when the item has no employer', () => {
      const bare = makeItem({ fields: {} });
      expect(matchesRule(bare, { type: 'employer', value: 'acme' })).toBe(false);
    });
  });

  describe('applyBlocklist', () => {
    it('should split items into kept and blocked with the matching rule', () => {
      const rules: BlockRule[] = [
        { type: 'site', value: 'spam.com', reason: 'spam' },
        { type: 'keyword', value: 'unpaid' },
      ];
      const spam = makeItem({ id: 's', link: 'https://spam.com/x' });
      const unpaid = makeItem({ id: 'u', link: 'https://ok.com/u', title: 'Unpaid role' });
      const ok = makeItem({ id: 'o', link: 'https://ok.com/y' });

      const result = applyBlocklist([spam, unpaid, ok], rules);

      expect(result.items).toEqual([ok]);
      expect(result.blocked).toEqual([
        { item: spam, rule: rules[0] },
        { item: unpaid, rule: rules[1] },
      ]);
    });

    it('should return the first matching rule', () => {
      const rules: BlockRule[] = [
        { type: 'keyword', value: 'engineer' },
        { type: 'site', value: 'example.com' },
      ];
      expect(findBlockingRule(makeItem(), rules)).toBe(rules[0]);
    });
  });

  describe('sortItems', () => {
    const low = makeItem({ id: 'low', fields: { points: 5 } });
    const high = makeItem({ id: 'high', fields: { points: 50 } });
    const none = makeItem({ id: 'none', fields: {} });

    it('should sort descending by a field', () => {
      expect(sortItems([low, none, high], 'points').map(i => i.id)).toEqual(['high', 'low', 'none']);
    });

    it('should sort ascending with a leading minus', () => {
      expect(sortItems([high, none, low], '-points').map(i => i.id)).toEqual(['low', 'high', 'none']);
    });

    it('should sort by top-level item properties', () => {
      const b = makeItem({ id: 'b', title: 'Beta' });
      const a = makeItem({ id: 'a', title: 'Alpha' });
      expect(sortItems([a, b], '-title').map(i => i.id)).toEqual(['a', 'b']);
    });
  });
});
