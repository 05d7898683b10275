// ============================================
// Blast Lifetime System
// ============================================

import { Tags, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { destroyEntity, requireBlast } from '../factories';

/**
 * BlastLifetimeSystem - ticks each blast's countdown and removes it
 * on the tick the countdown finishes.
 */
export class BlastLifetimeSystem implements System {
  readonly name = 'BlastLifetimeSystem';

  update(world: World, deltaTime: number, ctx: GameContext): void {
    for (const entity of world.getEntitiesWithTag(Tags.Blast)) {
      const { lifetime } = requireBlast(world, entity);
      lifetime.tick(deltaTime);
      if (lifetime.justFinished) {
        destroyEntity(world, entity, ctx.sprites);
      }
    }
  }
}
