// ============================================
// Blast Collision System
// Blasts destroy every monster they overlap
// ============================================

import { Tags, circleOverlap, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { destroyEntity, requireBlast, requireBody, requirePosition } from '../factories';

/**
 * BlastCollisionSystem - kills monsters inside any blast.
 *
 * A monster caught by two blasts in the same scan is destroyed and
 * counted once.
 */
export class BlastCollisionSystem implements System {
  readonly name = 'BlastCollisionSystem';

  update(world: World, _deltaTime: number, ctx: GameContext): void {
    const blasts = world.getEntitiesWithTag(Tags.Blast);
    if (blasts.length === 0) return;

    const monsters = world.getEntitiesWithTag(Tags.Monster);

    for (const blast of blasts) {
      const blastCircle = {
        radius: requireBlast(world, blast).radius,
        center: requirePosition(world, blast).current,
      };

      for (const monster of monsters) {
        // Already removed by an earlier blast this pass
        if (!world.hasEntity(monster)) continue;

        const monsterCircle = {
          radius: requireBody(world, monster).radius,
          center: requirePosition(world, monster).current,
        };

        if (circleOverlap(blastCircle, monsterCircle, ctx.random).collided) {
          destroyEntity(world, monster, ctx.sprites);
          ctx.stats.killed += 1;
        }
      }
    }
  }
}
