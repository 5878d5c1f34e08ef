/**
 * Matchflow — Evaluation Types
 */

import type { Item } from './item';

export interface EvaluationResult {
  item: Item;
  /** In [0, 1]; null when the backend or the parse failed for this item */
  score: number | null;
  /** Backend that answered for this item's chunk; null when none did */
  providerUsed: string | null;
  error?: string;
}

export interface ChunkOutcome {
  chunkIndex: number;
  size: number;
  providerUsed: string | null;
  attempts: BackendAttempt[];
}

export interface BackendAttempt {
  backend: string;
  succeeded: boolean;
  tries: number;
  error?: string;
}
