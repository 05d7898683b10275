// ============================================
// Blast Spawn System
// ============================================

import type { World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { createBlast, getPlayerEntity, requirePosition } from '../factories';

/**
 * BlastSpawnSystem - a blast on the player every period, at most one per tick.
 */
export class BlastSpawnSystem implements System {
  readonly name = 'BlastSpawnSystem';

  update(world: World, deltaTime: number, ctx: GameContext): void {
    ctx.blastSpawnTimer.tick(deltaTime);
    if (!ctx.blastSpawnTimer.justFinished) return;

    const player = getPlayerEntity(world);
    if (player === undefined) return;

    createBlast(world, requirePosition(world, player).current, ctx.sprites);
  }
}
