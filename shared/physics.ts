// ============================================
// Shared Physics Helpers
// Circle overlap and the Position/Velocity update rules
// ============================================

import type { Vec2 } from './types';
import type { PositionComponent, VelocityComponent } from './ecs/components';
import {
  ZERO,
  isZero,
  lengthSquared,
  normalizeOrZero,
  randomUnit,
  scale,
  sub,
  type RandomSource,
} from './math';

export interface Circle {
  radius: number;
  center: Vec2;
}

export interface OverlapResult {
  collided: boolean;
  push: Vec2; // Separation vector for `a`, pointing from b toward a
}

/**
 * Test two circles for overlap.
 *
 * The push magnitude is sqrt(radiusSum² - distance²), not the linear
 * penetration depth. Touching circles (overlap exactly 0) do not collide.
 * Coincident centers push along a random direction so the pair still
 * separates.
 */
export function circleOverlap(a: Circle, b: Circle, random: RandomSource = Math.random): OverlapResult {
  const radiusSum = a.radius + b.radius;
  const difference = sub(a.center, b.center);
  const distanceSquared = lengthSquared(difference);
  const overlap = radiusSum * radiusSum - distanceSquared;

  if (overlap <= 0) {
    return { collided: false, push: { ...ZERO } };
  }

  const magnitude = Math.sqrt(overlap);
  if (distanceSquared === 0) {
    return { collided: true, push: scale(randomUnit(random), magnitude) };
  }

  return { collided: true, push: scale(normalizeOrZero(difference), magnitude) };
}

/**
 * Move a position, replacing `change` with this delta.
 */
export function applyPosition(position: PositionComponent, delta: Vec2): void {
  position.current.x += delta.x;
  position.current.y += delta.y;
  position.change = { x: delta.x, y: delta.y };
}

/**
 * Move a position, adding this delta on top of the `change` already
 * recorded this tick (collision pushes after movement).
 */
export function applyAddPosition(position: PositionComponent, delta: Vec2): void {
  position.current.x += delta.x;
  position.current.y += delta.y;
  position.change = { x: position.change.x + delta.x, y: position.change.y + delta.y };
}

export function isVelocityZero(velocity: VelocityComponent): boolean {
  return isZero(velocity.direction) || velocity.speed === 0;
}

/**
 * Displacement a velocity produces over `seconds`.
 */
export function velocityChange(velocity: VelocityComponent, seconds: number): Vec2 {
  if (isVelocityZero(velocity)) {
    return { ...ZERO };
  }
  return scale(velocity.direction, velocity.speed * seconds);
}
