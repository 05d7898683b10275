// ============================================
// View Offset System
// Keeps the player at the center of the view
// ============================================

import { Components, sub, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { getPlayerEntity, requirePosition } from '../factories';

/**
 * ViewOffsetSystem - render translation = world position - player position.
 * Runs after every logical stage. No player -> translations stay as they are.
 */
export class ViewOffsetSystem implements System {
  readonly name = 'ViewOffsetSystem';

  update(world: World, _deltaTime: number, _ctx: GameContext): void {
    const player = getPlayerEntity(world);
    if (player === undefined) return;

    const origin = requirePosition(world, player).current;
    const positions = world.getStore(Components.Position);
    const renderables = world.getStore(Components.Renderable);

    world.queryEach([Components.Position, Components.Renderable], (entity) => {
      renderables.require(entity).translation = sub(positions.require(entity).current, origin);
    });
  }
}
