/**
 * Tests for the end-to-end pipeline
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { runPipeline } from '../src/pipeline';
import { Aggregator } from '../src/aggregator';
import { Evaluator } from '../src/evaluation';
import { Tracker } from '../src/tracker';
import { StaticProvider } from '../src/providers';
import { parseConfig } from '../src/config';
import type { RawItem } from '../src/types';
import { createFakeClock, makeTempDir, removeDir, scriptedBackend } from './helpers/fixtures';

const postings: RawItem[] = [
  { id: 1, title: 'Rust Engineer', link: 'https://jobs.example.com/1' },
  { id: 2, title: 'PHP Maintainer', link: 'https://jobs.example.com/2' },
  { id: 3, title: 'TypeScript Engineer', link: 'https://jobs.example.com/3' },
  { id: 4, title: 'Spam Offer', link: 'https://spam.com/4' },
];

describe('runPipeline', () => {
  let dir: string;

  const config = parseConfig({
    blocked_entities: [{ type: 'site', value: 'spam.com' }],
    evaluation: { score_threshold: 0.7, batch_size: 10, criteria: 'backend roles' },
  });

  const build = (responses: string[]) => {
    const backend = scriptedBackend('A', responses);
    return {
      backend,
      aggregator: new Aggregator([new StaticProvider('board', postings)], { blocklist: config.blocked_entities }),
      evaluator: new Evaluator({ backends: [backend], clock: createFakeClock() }),
    };
  };

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should search, score, threshold and track', async () => {
    const { backend, aggregator, evaluator } = build(['[0.9, 0.5, 0.7]']);
    const tracker = await Tracker.open({ storagePath: path.join(dir, 'items.json') });

    const report = await runPipeline({ aggregator, evaluator, tracker }, config, { query: 'engineer', count: 10 });

    expect(backend.batches[0].map(i => i.title)).toEqual(['Rust Engineer', 'PHP Maintainer', 'TypeScript Engineer']);
    expect(report.search).toEqual({ fetched: 4, duplicates: 0, blocked: 1, returned: 3, failedProviders: [] });
    expect(report.evaluation).toEqual({ scored: 3, unscored: 0, accepted: 2 });
    expect(report.accepted.map(r => r.item.title)).toEqual(['Rust Engineer', 'TypeScript Engineer']);
    expect(report.tracked.map(t => t.created)).toEqual([true, true]);
    expect(tracker.getAll().map(r => [r.item.title, r.status])).toEqual([
      ['Rust Engineer', 'new'],
      ['TypeScript Engineer', 'new'],
    ]);
  });

  it('should not create records again on a second run', async () => {
    const { aggregator, evaluator } = build(['[0.9, 0.5, 0.7]', '[0.9, 0.5, 0.7]']);
    const tracker = await Tracker.open({ storagePath: path.join(dir, 'items.json') });

    await runPipeline({ aggregator, evaluator, tracker }, config, { query: 'engineer', count: 10 });
    const second = await runPipeline({ aggregator, evaluator, tracker }, config, { query: 'engineer', count: 10 });

    expect(second.tracked.map(t => t.created)).toEqual([false, false]);
    expect(tracker.size).toBe(2);
  });

  it('should track nothing on a dry run', async () => {
    const { aggregator, evaluator } = build(['[0.9, 0.9, 0.9]']);

    const report = await runPipeline({ aggregator, evaluator }, config, {
      query: 'engineer',
      count: 10,
      dryRun: true,
    });

    expect(report.dryRun).toBe(true);
    expect(report.evaluation.accepted).toBe(3);
    expect(report.tracked).toEqual([]);
  });

  it('should honour an explicit threshold', async () => {
    const { aggregator, evaluator } = build(['[0.9, 0.5, 0.7]']);

    const report = await runPipeline({ aggregator, evaluator }, config, {
      query: 'engineer',
      count: 10,
      threshold: 0.8,
      dryRun: true,
    });

    expect(report.accepted.map(r => r.item.title)).toEqual(['Rust Engineer']);
  });

  it('should require a tracker unless dryRun is set', async () => {
    const { aggregator, evaluator } = build([]);

    await expect(
      runPipeline({ aggregator, evaluator }, config, { query: 'engineer', count: 10 })
    ).rejects.toThrow('A tracker is required unless dryRun is set');
  });
});
