// ============================================
// Monster Pursuit System
// Points every monster straight at the player
// ============================================

import { Tags, normalizeOrZero, sub, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { getPlayerEntity, requirePosition, requireVelocity } from '../factories';

/**
 * MonsterPursuitSystem - direct pursuit, no steering or pathfinding.
 *
 * Runs after movement so monsters chase the player's position from this tick.
 * A monster sitting exactly on the player gets a zero heading.
 */
export class MonsterPursuitSystem implements System {
  readonly name = 'MonsterPursuitSystem';

  update(world: World, _deltaTime: number, _ctx: GameContext): void {
    const player = getPlayerEntity(world);
    if (player === undefined) return;

    const target = requirePosition(world, player).current;

    world.forEachWithTag(Tags.Monster, (entity) => {
      const position = requirePosition(world, entity);
      const velocity = requireVelocity(world, entity);
      velocity.direction = normalizeOrZero(sub(target, position.current));
    });
  }
}
