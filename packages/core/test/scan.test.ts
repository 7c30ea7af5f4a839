import { describe, expect, it } from 'vitest';
import { containsChunked, containsLinear, countChunked, countLinear } from '../src/utils/scan.js';

describe('parent column scans', () => {
  const view = Uint32Array.of(0, 0, 1, 1, 1, 2, 2, 5);

  describe('counting', () => {
    it('counts matches with a plain loop', () => {
      expect(countLinear(view, 1)).toBe(3);
      expect(countLinear(view, 0)).toBe(2);
      expect(countLinear(view, 0, { from: 1 })).toBe(1);
      expect(countLinear(view, 9)).toBe(0);
    });

    it('counts matches that straddle window boundaries', () => {
      expect(countChunked(view, 1, { chunkSize: 3 })).toBe(3);
      expect(countChunked(view, 0, { from: 1, chunkSize: 2 })).toBe(1);
      expect(countChunked(view, 2, { chunkSize: 0 })).toBe(2);
      expect(countChunked(view, 5)).toBe(1);
    });

    it('ignores a starting point past the end', () => {
      expect(countLinear(view, 0, { from: 100 })).toBe(0);
      expect(countChunked(view, 0, { from: 100 })).toBe(0);
    });
  });

  describe('membership', () => {
    it('finds targets with both forms', () => {
      expect(containsLinear(view, 5)).toBe(true);
      expect(containsChunked(view, 5, { chunkSize: 2 })).toBe(true);
      expect(containsLinear(view, 3)).toBe(false);
      expect(containsChunked(view, 3, { chunkSize: 2 })).toBe(false);
    });

    it('honours the starting point', () => {
      expect(containsLinear(view, 0, { from: 2 })).toBe(false);
      expect(containsChunked(view, 0, { from: 2, chunkSize: 4 })).toBe(false);
      expect(containsChunked(view, 1, { from: 4, chunkSize: 4 })).toBe(true);
    });
  });
});
