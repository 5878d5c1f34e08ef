/**
 * Matchflow — Item Types
 *
 * Candidate items as produced by providers, and the rules that exclude them.
 */

import { z } from 'zod';

// ============================================================
// ITEM
// ============================================================

export const ItemSchema = z.object({
  /** Assigned by the producing provider; not globally unique */
  id: z.string(),
  title: z.string(),
  link: z.string(),
  /** Name of the provider that produced the item */
  source: z.string(),
  description: z.string().optional(),
  /** Provider-specific metadata (company, points, published date, ...) */
  fields: z.record(z.unknown()).default({}),
});
export type Item = z.infer<typeof ItemSchema>;

/**
 * What a provider may hand back before normalization.
 */
export interface RawItem {
  id?: string | number;
  title?: string;
  link?: string;
  url?: string;
  description?: string;
  source?: string;
  fields?: Record<string, unknown>;
}

// ============================================================
// FINGERPRINT
// ============================================================

export type Fingerprint = string;

export const DedupMethodSchema = z.enum(['url', 'content']);
export type DedupMethod = z.infer<typeof DedupMethodSchema>;

// ============================================================
// BLOCKLIST
// ============================================================

export const BlockRuleTypeSchema = z.enum(['site', 'employer', 'keyword']);
export type BlockRuleType = z.infer<typeof BlockRuleTypeSchema>;

export const BlockRuleSchema = z.object({
  type: BlockRuleTypeSchema,
  value: z.string().min(1, 'Block rule value cannot be empty'),
  reason: z.string().optional(),
});
export type BlockRule = z.infer<typeof BlockRuleSchema>;
