/**
 * Matchflow — Run Identifiers
 *
 * Short ids stamped on log lines so a search, an evaluation or a pipeline
 * run can be followed across components.
 */

import { nanoid } from 'nanoid';

/**
 * Format: MF-{YYYY}-{MMDD}-{TYPE}-{SEQ}, or MF-{YYYY}-{MMDD}-{SEQ} without a type.
 */
export function generateRunId(type?: string, now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  const seq = nanoid(6).toUpperCase();

  if (type) {
    return `MF-${year}-${month}${day}-${type}-${seq}`;
  }
  return `MF-${year}-${month}${day}-${seq}`;
}

export const RUN_ID_PATTERN = /^MF-\d{4}-\d{4}-(?:[A-Z]+-)?[A-Z0-9_-]{6}$/;
