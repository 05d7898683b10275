// ============================================
// Movement Intent
// Resolves raw directional input into a player direction
// ============================================

import type { DirectionalKeys, Vec2 } from './types';
import { normalizeOrZero } from './math';

/**
 * Axis vector from four pressed signals.
 * Right wins over left and up wins over down when both are held.
 */
export function directionFromKeys(keys: DirectionalKeys): Vec2 {
  let x = 0;
  if (keys.right) {
    x = 1;
  } else if (keys.left) {
    x = -1;
  }

  let y = 0;
  if (keys.up) {
    y = 1;
  } else if (keys.down) {
    y = -1;
  }

  return { x, y };
}

function resolveAxis(value: number): number {
  if (value > 0) return 1;
  if (value < 0) return -1;
  return 0; // Also covers NaN
}

/**
 * Player direction for this tick: each intent axis snapped to -1, 0 or 1,
 * then normalized (diagonals get unit length, no input gives zero).
 */
export function resolveIntent(intent: Vec2): Vec2 {
  return normalizeOrZero({ x: resolveAxis(intent.x), y: resolveAxis(intent.y) });
}
