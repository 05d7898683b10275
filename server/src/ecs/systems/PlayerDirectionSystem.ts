// ============================================
// Player Direction System
// Turns the current movement intent into the player's heading
// ============================================

import { Tags, resolveIntent, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { requireInput, requireVelocity } from '../factories';

/**
 * PlayerDirectionSystem - heading from this tick's intent only.
 *
 * Each intent axis snaps to -1, 0 or 1 and the result is normalized,
 * so diagonals move at the same speed as straight lines.
 * No player yet -> nothing to do.
 */
export class PlayerDirectionSystem implements System {
  readonly name = 'PlayerDirectionSystem';

  update(world: World, _deltaTime: number, _ctx: GameContext): void {
    world.forEachWithTag(Tags.Player, (entity) => {
      const input = requireInput(world, entity);
      const velocity = requireVelocity(world, entity);
      velocity.direction = resolveIntent(input.direction);
    });
  }
}
