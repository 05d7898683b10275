// ============================================
// Shared Math Helpers
// Pure 2D vector functions used by every simulation stage
// ============================================

import type { Vec2 } from './types';

// Source of uniform numbers in [0, 1) - Math.random unless a caller injects one
export type RandomSource = () => number;

export const ZERO: Readonly<Vec2> = Object.freeze({ x: 0, y: 0 });

export function vec2(x: number, y: number): Vec2 {
  return { x, y };
}

export function add(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x + b.x, y: a.y + b.y };
}

export function sub(a: Vec2, b: Vec2): Vec2 {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function scale(v: Vec2, factor: number): Vec2 {
  return { x: v.x * factor, y: v.y * factor };
}

export function negate(v: Vec2): Vec2 {
  return { x: -v.x, y: -v.y };
}

export function lengthSquared(v: Vec2): number {
  return v.x * v.x + v.y * v.y;
}

/**
 * Calculate magnitude (length) of a 2D vector
 */
export function length(v: Vec2): number {
  return Math.sqrt(lengthSquared(v));
}

export function isZero(v: Vec2): boolean {
  return v.x === 0 && v.y === 0;
}

/**
 * Normalize a vector to unit length.
 * Returns the zero vector for zero (or non-finite length) input instead of NaN.
 */
export function normalizeOrZero(v: Vec2): Vec2 {
  const len = length(v);
  if (len === 0 || !Number.isFinite(len)) {
    return { x: 0, y: 0 };
  }
  return { x: v.x / len, y: v.y / len };
}

/**
 * Random unit vector with a uniformly distributed angle.
 */
export function randomUnit(random: RandomSource = Math.random): Vec2 {
  const angle = random() * Math.PI * 2;
  return { x: Math.cos(angle), y: Math.sin(angle) };
}
