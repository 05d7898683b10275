// ============================================
// ECS System Types
// ============================================

import type { World } from '@swarmfall/shared';
import type { GameContext } from './GameContext';

/**
 * Base System interface
 * All simulation stages implement this interface
 */
export interface System {
  /** System name for debugging/logging */
  readonly name: string;

  /**
   * Called every tick
   * @param world The ECS World containing all entities and components
   * @param deltaTime Time since last tick in seconds
   * @param ctx Session state shared by all systems
   */
  update(world: World, deltaTime: number, ctx: GameContext): void;
}

/**
 * System priority - determines update order
 * Lower numbers run first
 *
 * Order of a tick:
 * 1. Player direction (from input)
 * 2. Movement (apply velocities)
 * 3. Monster pursuit (aim at the player's new position)
 * 4. Lethal contact (player caught -> reset request)
 * 5. Body collision (push overlapping bodies apart)
 * 6. Blast collision (kill monsters inside blasts)
 * 7. Blast lifetime (expire blasts)
 * 8. Monster spawn / blast spawn (timers)
 * 9. New game (apply queued resets)
 * 10. View offset (render translations relative to the player)
 */
export const SystemPriority = {
  // Intent and movement
  PLAYER_DIRECTION: 100,
  MOVEMENT: 200,
  MONSTER_PURSUIT: 300,

  // Collisions (lethal check sees positions before pushes)
  LETHAL_CONTACT: 400,
  BODY_COLLISION: 410,
  BLAST_COLLISION: 420,

  // Lifetimes and spawning
  BLAST_LIFETIME: 500,
  MONSTER_SPAWN: 600,
  BLAST_SPAWN: 610,

  // Session lifecycle
  NEW_GAME: 700,

  // Presentation - runs last
  VIEW_OFFSET: 900,
} as const;
