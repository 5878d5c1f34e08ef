/**
 * Matchflow — Scoring Prompt
 *
 * One prompt per chunk: the criteria, the items as JSON, and a strict
 * output contract (a JSON array with one score per item, in order).
 */

import type { Item } from '../types';

export interface ScoringPrompt {
  system: string;
  user: string;
}

export const DEFAULT_SYSTEM_INSTRUCTIONS = 'Evaluate items for relevance and quality.';

function buildSystemPrompt(instructions: string): string {
  return `You are a scoring engine. ${instructions}

RULES:
1. Score every item independently against the criteria.
2. A score is a number between 0.0 (no match) and 1.0 (perfect match).
3. Return exactly one score per item, in the order the items are given.
4. Respond ONLY with a JSON array of numbers. No markdown, no explanation.`;
}

function itemContext(item: Item, index: number): Record<string, unknown> {
  return {
    index,
    title: item.title,
    link: item.link,
    source: item.source,
    description: item.description ?? null,
    fields: item.fields,
  };
}

export function buildScoringPrompt(
  items: Item[],
  criteria: string,
  systemInstructions: string = DEFAULT_SYSTEM_INSTRUCTIONS
): ScoringPrompt {
  const payload = items.map((item, index) => itemContext(item, index));

  const user = `Evaluate these ${items.length} items based on: ${criteria}

## ITEMS
\`\`\`json
${JSON.stringify(payload, null, 2)}
\`\`\`

## REQUIRED OUTPUT FORMAT
A JSON array of ${items.length} scores (0.0-1.0), one per item:
[0.85, 0.62, 0.91, ...]`;

  return { system: buildSystemPrompt(systemInstructions), user };
}
