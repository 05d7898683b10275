// ============================================
// ECS Component Interfaces
// All component data shapes for the ECS
// ============================================

import type { AssetId, Vec2 } from '../types';
import type { Timer } from '../timer';

// ============================================
// Core Components
// ============================================

/**
 * Position - where an entity exists on the plane.
 * Used by: Player, Monsters, Blasts
 *
 * `change` is the displacement recorded by the latest update:
 * movement overwrites it, collision pushes add to it.
 */
export interface PositionComponent {
  current: Vec2;
  change: Vec2;
}

/**
 * Velocity - heading and speed.
 * Used by: Player, Monsters
 *
 * direction is unit length or zero; speed in units per second.
 */
export interface VelocityComponent {
  direction: Vec2;
  speed: number;
}

/**
 * Body - physical collision facet.
 * Used by: Player (immovable), Monsters
 *
 * A null mass means immovable: the body pins whatever it overlaps.
 * Per-tick push state is not stored here - BodyCollisionSystem keeps it
 * in its own scratch buffer.
 */
export interface BodyComponent {
  radius: number;
  mass: number | null;
}

// ============================================
// Player-Specific Components
// ============================================

/**
 * Input - current movement intent from the input collaborator.
 * Written by the host every tick, read by PlayerDirectionSystem.
 */
export interface InputComponent {
  direction: Vec2; // Raw intent; each axis resolved to -1, 0 or 1 when consumed
}

// ============================================
// Entity Type Components
// ============================================

/**
 * Blast - short-lived area damage centered where it spawned.
 * Destroys overlapping monsters, removed when its lifetime finishes.
 */
export interface BlastComponent {
  lifetime: Timer; // Single-shot
  radius: number;
}

// ============================================
// Presentation Components
// ============================================

/**
 * Renderable - what the rendering collaborator draws for this entity.
 * translation is rewritten every tick by ViewOffsetSystem.
 */
export interface RenderableComponent {
  asset: AssetId;
  scale: number;
  size?: number;
  translation: Vec2;
}
