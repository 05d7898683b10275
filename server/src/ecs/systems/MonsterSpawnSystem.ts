// ============================================
// Monster Spawn System
// Timer-gated spawning on a ring around the player
// ============================================

import { add, randomUnit, scale, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { aliveCount } from './GameContext';
import { createMonster, getPlayerEntity, requirePosition } from '../factories';
import { getConfig } from '../../dev';
import { logMonsterSpawnSkipped } from '../../logger';

/**
 * MonsterSpawnSystem - at most one monster per tick.
 *
 * A long frame that covers several periods still spawns only one.
 * Nothing spawns without a player or once the alive count hits the cap.
 */
export class MonsterSpawnSystem implements System {
  readonly name = 'MonsterSpawnSystem';

  update(world: World, deltaTime: number, ctx: GameContext): void {
    ctx.monsterSpawnTimer.tick(deltaTime);
    if (!ctx.monsterSpawnTimer.justFinished) return;

    const player = getPlayerEntity(world);
    if (player === undefined) return;

    const alive = aliveCount(ctx.stats);
    const limit = getConfig('MONSTER_SPAWN_LIMIT');
    if (alive >= limit) {
      logMonsterSpawnSkipped(alive, limit);
      return;
    }

    const center = requirePosition(world, player).current;
    const offset = scale(randomUnit(ctx.random), getConfig('MONSTER_SPAWN_DISTANCE'));
    createMonster(world, add(center, offset), ctx.sprites);
    ctx.stats.spawned += 1;
  }
}
