// ============================================
// Movement System
// Integrates velocity into position
// ============================================

import { Components, applyPosition, isVelocityZero, velocityChange, type World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';

/**
 * MovementSystem - moves every entity with Position and Velocity.
 *
 * Moving entities get `change` overwritten with this tick's step.
 * Stationary entities are skipped and keep their previous `change`.
 */
export class MovementSystem implements System {
  readonly name = 'MovementSystem';

  update(world: World, deltaTime: number, _ctx: GameContext): void {
    const positions = world.getStore(Components.Position);
    const velocities = world.getStore(Components.Velocity);

    world.queryEach([Components.Position, Components.Velocity], (entity) => {
      const velocity = velocities.require(entity);
      if (isVelocityZero(velocity)) return;

      applyPosition(positions.require(entity), velocityChange(velocity, deltaTime));
    });
  }
}
