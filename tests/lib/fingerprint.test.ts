/**
 * Tests for item fingerprints and similarity
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeUrl,
  normalizeText,
  urlFingerprint,
  contentFingerprint,
  fingerprintItem,
  tokenSetSimilarity,
  itemSimilarity,
} from '../../src/lib/fingerprint';

describe('Fingerprints', () => {
  describe('normalizeUrl', () => {
    it('should drop scheme, www, fragment and trailing slash', () => {
      expect(normalizeUrl('https://www.Example.com/Jobs/123/#apply')).toBe('example.com/Jobs/123');
    });

    it('should drop tracking parameters and sort the rest', () => {
      expect(normalizeUrl('https://example.com/jobs?utm_source=x&b=2&ref=abc&a=1'))
        .toBe('example.com/jobs?a=1&b=2');
    });

    it('should keep the port', () => {
      expect(normalizeUrl('http://localhost:8080/x/')).toBe('localhost:8080/x');
    });

    it('should fall back to lower-casing text that is not a URL', () => {
      expect(normalizeUrl(' Not A URL/ ')).toBe('not a url');
    });
  });

  describe('normalizeText', () => {
    it('should lower-case and collapse whitespace', () => {
      expect(normalizeText('  Senior   Rust\nEngineer ')).toBe('senior rust engineer');
    });
  });

  describe('urlFingerprint', () => {
    it('should be 16 hex characters', () => {
      expect(urlFingerprint('https://example.com/a')).toMatch(/^[0-9a-f]{16}$/);
    });

    it('should match for URLs that differ only in normalized parts', () => {
      expect(urlFingerprint('https://www.example.com/a/?utm_medium=email'))
        .toBe(urlFingerprint('http://example.com/a'));
    });

    it('should differ for different paths', () => {
      expect(urlFingerprint('https://example.com/a')).not.toBe(urlFingerprint('https://example.com/b'));
    });
  });

  describe('fingerprintItem', () => {
    it('should use the link when present', () => {
      const item = { link: 'https://example.com/a', title: 'One', description: 'x' };
      expect(fingerprintItem(item)).toBe(urlFingerprint('https://example.com/a'));
    });

    it('should use title and description when the link is empty', () => {
      const item = { link: '  ', title: 'Rust Engineer', description: 'Remote' };
      expect(fingerprintItem(item)).toBe(contentFingerprint('rust engineer', 'remote'));
    });
  });

  describe('tokenSetSimilarity', () => {
    it('should be 1 for texts with the same words', () => {
      expect(tokenSetSimilarity('Senior Rust Engineer', 'senior rust engineer!')).toBe(1);
    });

    it('should be the Jaccard ratio of the token sets', () => {
      expect(tokenSetSimilarity('rust engineer', 'rust developer')).toBeCloseTo(1 / 3);
    });

    it('should be 0 when only one side has tokens', () => {
      expect(tokenSetSimilarity('rust', '')).toBe(0);
    });

    it('should ignore single-character tokens', () => {
      expect(tokenSetSimilarity('a rust b', 'rust')).toBe(1);
    });
  });

  describe('itemSimilarity', () => {
    it('should compare title and description together', () => {
      const a = { title: 'Rust Engineer', description: 'Remote role' };
      const b = { title: 'Rust Engineer', description: undefined };
      // {rust, engineer, remote, role} vs {rust, engineer}
      expect(itemSimilarity(a, b)).toBe(0.5);
    });
  });
});
