/**
 * Shared test fixtures
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { Item } from '../../src/types';
import type { Clock } from '../../src/lib/rate-limiter';
import type { AIBackend } from '../../src/evaluation/backends/base';

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    id: 'item-1',
    title: 'Senior TypeScript Engineer',
    link: 'https://jobs.example.com/postings/1',
    source: 'test',
    description: 'Build backend services',
    fields: {},
    ...overrides,
  };
}

/**
 * A clock whose sleep advances time instantly.
 */
export function createFakeClock(start = 0): Clock & { sleeps: number[]; advance(ms: number): void } {
  let now = start;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    advance(ms: number) {
      now += ms;
    },
  };
}

/**
 * A backend answering from a queue of scripted responses. A string is
 * returned as the response text; an Error is thrown.
 */
export function scriptedBackend(
  name: string,
  responses: Array<string | Error>,
  options: { available?: boolean; callLog?: string[] } = {}
): AIBackend & { calls: number; batches: Item[][] } {
  const queue = [...responses];
  const batches: Item[][] = [];
  const backend = {
    name,
    calls: 0,
    batches,
    isAvailable: () => options.available ?? true,
    async scoreBatch(items: Item[]): Promise<string> {
      backend.calls++;
      backend.batches.push(items);
      options.callLog?.push(name);
      const next = queue.shift();
      if (next === undefined) {
        throw new Error(`${name}: no scripted response left`);
      }
      if (next instanceof Error) throw next;
      return next;
    },
  };
  return backend;
}

/**
 * A backend that fails every call with the same error.
 */
export function failingBackend(
  name: string,
  error: Error,
  options: { callLog?: string[] } = {}
): AIBackend & { calls: number } {
  const backend = {
    name,
    calls: 0,
    isAvailable: () => true,
    async scoreBatch(): Promise<string> {
      backend.calls++;
      options.callLog?.push(name);
      throw error;
    },
  };
  return backend;
}

/**
 * A backend whose calls never settle.
 */
export function hangingBackend(name: string): AIBackend & { calls: number } {
  const backend = {
    name,
    calls: 0,
    isAvailable: () => true,
    scoreBatch(): Promise<string> {
      backend.calls++;
      return new Promise<string>(() => {});
    },
  };
  return backend;
}

export async function makeTempDir(prefix = 'matchflow-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
