// ============================================
// Shared Types & Interfaces
// Vectors, roles, events, and the render-side contract
// ============================================

import type { EntityId } from './ecs/types';

// 2D vector on the simulation plane (world units)
export interface Vec2 {
  x: number;
  y: number;
}

// Role an entity plays for its whole life (exactly one per entity)
export type EntityRole = 'player' | 'monster' | 'blast';

// Why a new game was requested - carried for logging only
export type NewGameCause = 'startup' | 'caught' | 'requested';

/**
 * One-shot reset signal. Any number may be queued in a tick;
 * the lifecycle stage collapses them into a single reset.
 */
export interface NewGameEvent {
  type: 'newGame';
  cause: NewGameCause;
}

// Four independent "pressed" signals from the input collaborator
export interface DirectionalKeys {
  up: boolean;
  down: boolean;
  left: boolean;
  right: boolean;
}

// ============================================
// Rendering Contract
// The core never touches textures - it only names assets
// ============================================

export type AssetId = 'player.png' | 'monster.png' | 'blast.png';

export interface SpriteTransform {
  translation: Vec2;
  scale: number;
  size?: number; // Custom sprite edge length in world units (overrides texture size)
}

/**
 * Sprite factory supplied by the rendering collaborator.
 * Called when a visible entity is spawned or removed.
 */
export interface SpriteFactory {
  create(entity: EntityId, asset: AssetId, transform: SpriteTransform): void;
  destroy(entity: EntityId): void;
}

/**
 * Per-entity render data, read once per tick after the view offset stage.
 * translation is relative to the player (player is always at 0,0).
 */
export interface RenderSnapshot {
  entity: EntityId;
  role: EntityRole;
  asset: AssetId;
  translation: Vec2;
  scale: number;
  size?: number;
}
