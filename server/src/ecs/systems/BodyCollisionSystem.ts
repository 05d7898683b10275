// ============================================
// Body Collision System
// Pushes overlapping bodies apart, weighted by mass
// ============================================

import {
  Components,
  ZERO,
  add,
  applyAddPosition,
  circleOverlap,
  isZero,
  negate,
  scale,
  type BodyComponent,
  type EntityId,
  type PositionComponent,
  type Vec2,
  type World,
} from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { getConfig } from '../../dev';

interface CollisionBody {
  entity: EntityId;
  body: BodyComponent;
  position: PositionComponent;
}

/**
 * BodyCollisionSystem - pairwise overlap resolution over every body.
 *
 * For each overlapping pair (push points from B toward A):
 * - immovable A: B takes the whole -push and turns firm
 * - immovable B: A takes the whole push and turns firm
 * - firm A: B takes the whole -push and turns firm
 * - firm B: A takes the whole push and turns firm
 * - otherwise the push is split by inverse mass and accumulated
 *
 * A firm body acts as a pin for the rest of the pass, so a monster squeezed
 * against the player passes the push on instead of sinking into it.
 * Immovable bodies are checked before firmness and never move.
 *
 * Displacements live in a scratch buffer indexed like the pass's body list
 * and are zeroed at the start of every pass. Each movable body then moves by
 * its displacement scaled by COLLISION_DISPLACEMENT_FACTOR.
 */
export class BodyCollisionSystem implements System {
  readonly name = 'BodyCollisionSystem';

  private displacement: Vec2[] = [];
  private firm: boolean[] = [];

  update(world: World, _deltaTime: number, ctx: GameContext): void {
    const bodies = this.collectBodies(world);
    this.resetScratch(bodies.length);

    for (let i = 0; i < bodies.length; i++) {
      for (let j = i + 1; j < bodies.length; j++) {
        this.resolvePair(bodies, i, j, ctx);
      }
    }

    const factor = getConfig('COLLISION_DISPLACEMENT_FACTOR');
    for (let i = 0; i < bodies.length; i++) {
      const { body, position } = bodies[i];
      const displacement = this.displacement[i];
      if (body.mass === null || isZero(displacement)) continue;
      applyAddPosition(position, scale(displacement, factor));
    }
  }

  private collectBodies(world: World): CollisionBody[] {
    const positions = world.getStore(Components.Position);
    const bodies: CollisionBody[] = [];

    for (const [entity, body] of world.getStore(Components.Body).entries()) {
      const position = positions.get(entity);
      if (position) {
        bodies.push({ entity, body, position });
      }
    }

    return bodies;
  }

  private resetScratch(count: number): void {
    this.displacement = [];
    this.firm = [];
    for (let i = 0; i < count; i++) {
      this.displacement.push({ x: ZERO.x, y: ZERO.y });
      this.firm.push(false);
    }
  }

  private resolvePair(bodies: CollisionBody[], i: number, j: number, ctx: GameContext): void {
    const a = bodies[i];
    const b = bodies[j];

    const { collided, push } = circleOverlap(
      { radius: a.body.radius, center: a.position.current },
      { radius: b.body.radius, center: b.position.current },
      ctx.random
    );
    if (!collided) return;

    const massA = a.body.mass;
    const massB = b.body.mass;
    if (massA === null && massB === null) return;

    if (massA === null) {
      this.pin(j, negate(push));
    } else if (massB === null) {
      this.pin(i, push);
    } else if (this.firm[i]) {
      this.pin(j, negate(push));
    } else if (this.firm[j]) {
      this.pin(i, push);
    } else {
      const total = massA + massB;
      this.displacement[i] = add(this.displacement[i], scale(push, massB / total));
      this.displacement[j] = add(this.displacement[j], scale(push, -massA / total));
    }
  }

  /**
   * The body takes the full push this pair and becomes firm.
   * Replaces whatever it had accumulated so far.
   */
  private pin(index: number, push: Vec2): void {
    this.displacement[index] = push;
    this.firm[index] = true;
  }
}
