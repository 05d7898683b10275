// ============================================
// Lethal Contact System
// A monster touching the player ends the session
// ============================================

import { Tags, circleOverlap, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { aliveCount } from './GameContext';
import { requireBody, requirePosition } from '../factories';
import { logPlayerCaught } from '../../logger';

/**
 * LethalContactSystem - queues one reset on the first player/monster overlap.
 *
 * Scanning stops at the first hit; a second signal in the same tick would
 * collapse into the same reset anyway.
 */
export class LethalContactSystem implements System {
  readonly name = 'LethalContactSystem';

  update(world: World, _deltaTime: number, ctx: GameContext): void {
    const players = world.getEntitiesWithTag(Tags.Player);
    const monsters = world.getEntitiesWithTag(Tags.Monster);

    for (const player of players) {
      const playerPosition = requirePosition(world, player);
      const playerCircle = { radius: requireBody(world, player).radius, center: playerPosition.current };

      for (const monster of monsters) {
        const monsterCircle = {
          radius: requireBody(world, monster).radius,
          center: requirePosition(world, monster).current,
        };

        if (circleOverlap(playerCircle, monsterCircle, ctx.random).collided) {
          logPlayerCaught(playerPosition.current, aliveCount(ctx.stats));
          ctx.newGameEvents.push({ type: 'newGame', cause: 'caught' });
          return;
        }
      }
    }
  }
}
