/**
 * Tests for reading scores out of backend responses
 */

import { describe, it, expect } from 'vitest';
import { parseScores, extractScoreArray, toScore } from '../../src/evaluation/parser';

function scoresOf(raw: string, count: number): Array<number | string> | null {
  const parsed = parseScores(raw, count);
  if (!parsed) return null;
  return parsed.map(p => (p.ok ? p.score : p.error.message));
}

describe('Score Parser', () => {
  describe('extractScoreArray', () => {
    it('should read a bare JSON array', () => {
      expect(extractScoreArray('[0.9, 0.2]')).toEqual([0.9, 0.2]);
    });

    it('should read a scores property', () => {
      expect(extractScoreArray('{"scores": [0.3]}')).toEqual([0.3]);
    });

    it('should read a fenced block', () => {
      expect(extractScoreArray('Here you go:\n```json\n[0.5, 0.7]\n```\nThanks')).toEqual([0.5, 0.7]);
    });

    it('should find an array embedded in prose', () => {
      expect(extractScoreArray('Scores: [0.1, 0.4] as requested')).toEqual([0.1, 0.4]);
    });

    it('should return null when there is no array', () => {
      expect(extractScoreArray('I cannot score these items.')).toBeNull();
    });
  });

  describe('toScore', () => {
    it('should accept numbers, numeric strings and score objects', () => {
      expect(toScore(0.4)).toBe(0.4);
      expect(toScore(' 0.6 ')).toBe(0.6);
      expect(toScore({ score: 0.8 })).toBe(0.8);
    });

    it('should clamp floating-point drift at the bounds', () => {
      expect(toScore(1.0000001)).toBe(1);
      expect(toScore(-0.0000001)).toBe(0);
    });

    it('should explain values that are not scores', () => {
      expect(toScore('high')).toBe('expected a number, got "high"');
      expect(toScore(null)).toBe('expected a number, got null');
      expect(toScore(1.5)).toBe('score 1.5 outside [0, 1]');
    });
  });

  describe('parseScores', () => {
    it('should parse one score per item', () => {
      expect(scoresOf('[0.9, 0.2, 1]', 3)).toEqual([0.9, 0.2, 1]);
    });

    it('should fail only the bad elements', () => {
      expect(scoresOf('[0.9, "n/a", -0.2]', 3)).toEqual([
        0.9,
        'Item 1: expected a number, got "n/a"',
        'Item 2: score -0.2 outside [0, 1]',
      ]);
    });

    it('should mark missing trailing scores', () => {
      expect(scoresOf('[0.5]', 3)).toEqual([0.5, 'Item 1: missing score', 'Item 2: missing score']);
    });

    it('should ignore extra scores', () => {
      expect(scoresOf('[0.1, 0.2, 0.3]', 2)).toEqual([0.1, 0.2]);
    });

    it('should return null when no array is present', () => {
      expect(parseScores('no scores here', 2)).toBeNull();
    });
  });
});
