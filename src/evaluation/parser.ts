/**
 * Matchflow — Score Parser
 *
 * Reads per-item scores out of a backend's raw text. A bad element costs
 * only its own item; a response with no array at all costs the whole chunk.
 */

import { EvaluationParseError } from '../lib/errors';

export type ParsedScore =
  | { ok: true; score: number }
  | { ok: false; error: EvaluationParseError };

/** Tolerated floating-point drift outside [0, 1] before clamping */
export const SCORE_EPSILON = 1e-6;

function tryParseArray(text: string): unknown[] | null {
  try {
    const value: unknown = JSON.parse(text);
    if (Array.isArray(value)) return value;
    if (typeof value === 'object' && value !== null && 'scores' in value && Array.isArray(value.scores)) {
      return value.scores;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Locate the score array: the whole response, a fenced code block, or the
 * first bracketed span that parses as a JSON array.
 */
export function extractScoreArray(raw: string): unknown[] | null {
  const direct = tryParseArray(raw.trim());
  if (direct) return direct;

  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)\s*```/);
  if (fenced) {
    const fromBlock = tryParseArray(fenced[1]);
    if (fromBlock) return fromBlock;
  }

  for (const match of raw.matchAll(/\[[^[\]]*\]/g)) {
    const candidate = tryParseArray(match[0]);
    if (candidate) return candidate;
  }

  return null;
}

/**
 * Convert one array element to a score, or explain why it is not one.
 */
export function toScore(value: unknown): number | string {
  if (typeof value === 'object' && value !== null && 'score' in value) {
    return toScore(value.score);
  }

  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value.trim());
  } else {
    return `expected a number, got ${JSON.stringify(value) ?? String(value)}`;
  }

  if (!Number.isFinite(numeric)) {
    return `expected a number, got ${JSON.stringify(value)}`;
  }
  if (numeric < -SCORE_EPSILON || numeric > 1 + SCORE_EPSILON) {
    return `score ${numeric} outside [0, 1]`;
  }
  return Math.min(1, Math.max(0, numeric));
}

/**
 * Parse `expectedCount` scores from a response. Returns null when the
 * response holds no score array at all.
 */
export function parseScores(raw: string, expectedCount: number): ParsedScore[] | null {
  const values = extractScoreArray(raw);
  if (!values) return null;

  const parsed: ParsedScore[] = [];
  for (let index = 0; index < expectedCount; index++) {
    if (index >= values.length) {
      parsed.push({ ok: false, error: new EvaluationParseError(index, 'missing score') });
      continue;
    }

    const result = toScore(values[index]);
    parsed.push(
      typeof result === 'number'
        ? { ok: true, score: result }
        : { ok: false, error: new EvaluationParseError(index, result) }
    );
  }

  return parsed;
}
