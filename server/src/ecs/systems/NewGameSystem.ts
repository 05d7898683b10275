// ============================================
// New Game System
// Session lifecycle: applies queued reset requests
// ============================================

import type { World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { createPlayer, destroyAllEntities } from '../factories';
import { logNewGame } from '../../logger';

/**
 * NewGameSystem - the only place a session starts.
 *
 * Any number of queued requests collapse into one reset:
 * clear the world, zero the stats, place a fresh player at the origin,
 * restart both spawn timers. Running it on an empty world ends in the
 * same state as on a populated one.
 */
export class NewGameSystem implements System {
  readonly name = 'NewGameSystem';

  update(world: World, _deltaTime: number, ctx: GameContext): void {
    const events = ctx.newGameEvents.drain();
    if (events.length === 0) return;

    const cleared = destroyAllEntities(world, ctx.sprites);

    ctx.stats.spawned = 0;
    ctx.stats.killed = 0;

    createPlayer(world, ctx.sprites);

    for (const timer of [ctx.monsterSpawnTimer, ctx.blastSpawnTimer]) {
      timer.reset();
      timer.unpause();
    }

    ctx.sessions += 1;
    logNewGame(events[0].cause, events.length, cleared);
  }
}
