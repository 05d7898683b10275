// ============================================
// Vector Math Unit Tests
// ============================================

import { describe, it, expect } from 'vitest';
import {
  add,
  sub,
  scale,
  length,
  isZero,
  normalizeOrZero,
  randomUnit,
} from '../math';

describe('vector math', () => {
  describe('basic operations', () => {
    it('adds, subtracts and scales component-wise', () => {
      expect(add({ x: 1, y: 2 }, { x: 3, y: -4 })).toEqual({ x: 4, y: -2 });
      expect(sub({ x: 1, y: 2 }, { x: 3, y: -4 })).toEqual({ x: -2, y: 6 });
      expect(scale({ x: 1.5, y: -2 }, 2)).toEqual({ x: 3, y: -4 });
    });

    it('measures length', () => {
      expect(length({ x: 3, y: 4 })).toBe(5);
    });

    it('detects the zero vector', () => {
      expect(isZero({ x: 0, y: 0 })).toBe(true);
      expect(isZero({ x: 0, y: 0.001 })).toBe(false);
    });
  });

  describe('normalizeOrZero', () => {
    it('returns unit vector', () => {
      const n = normalizeOrZero({ x: 0, y: -20 });
      expect(n).toEqual({ x: 0, y: -1 });
    });

    it('normalizes diagonal vector', () => {
      const n = normalizeOrZero({ x: 1, y: 1 });
      expect(n.x).toBeCloseTo(Math.SQRT1_2, 10);
      expect(n.y).toBeCloseTo(Math.SQRT1_2, 10);
    });

    it('returns zero for zero vector instead of NaN', () => {
      expect(normalizeOrZero({ x: 0, y: 0 })).toEqual({ x: 0, y: 0 });
    });
  });

  describe('randomUnit', () => {
    it('always has unit length', () => {
      for (let i = 0; i < 50; i++) {
        expect(length(randomUnit())).toBeCloseTo(1, 10);
      }
    });

    it('maps the random source to an angle', () => {
      // 0.5 of a full turn points along -X
      const v = randomUnit(() => 0.5);
      expect(v.x).toBeCloseTo(-1, 10);
      expect(v.y).toBeCloseTo(0, 10);
    });
  });
});
