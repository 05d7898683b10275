// ============================================
// Simulation
// Owns the world and session state, runs one tick at a time
// ============================================

import { Components, ZERO, directionFromKeys } from '@swarmfall/shared';
import type {
  DirectionalKeys,
  NewGameCause,
  RandomSource,
  RenderSnapshot,
  SpriteFactory,
  Vec2,
  World,
} from '@swarmfall/shared';
import {
  createWorld,
  getEntityRole,
  headlessSprites,
  setPlayerIntent,
  createGameContext,
  SystemRunner,
  SystemPriority,
  PlayerDirectionSystem,
  MovementSystem,
  MonsterPursuitSystem,
  LethalContactSystem,
  BodyCollisionSystem,
  BlastCollisionSystem,
  BlastLifetimeSystem,
  MonsterSpawnSystem,
  BlastSpawnSystem,
  NewGameSystem,
  ViewOffsetSystem,
  type GameContext,
} from './ecs';
import { getTimeScale, shouldRunTick } from './dev';
import { calculateAggregateStats, type AggregateStats } from './telemetry';

export interface SimulationOptions {
  // Direction source for spawn placement and coincident overlaps
  random?: RandomSource;
  // Rendering collaborator; defaults to drawing nothing
  sprites?: SpriteFactory;
}

/**
 * Movement intent for one tick: a raw axis vector or four pressed signals.
 */
export type Intent = Vec2 | DirectionalKeys;

function intentToVector(intent: Intent): Vec2 {
  return 'up' in intent ? directionFromKeys(intent) : intent;
}

/**
 * Simulation - the tick-driven core.
 *
 * The first tick starts the session: a startup reset is queued on construction
 * and applied by NewGameSystem at the end of that tick.
 *
 * Dev controls (pause, step, time scale, config overrides) live in module state
 * in dev.ts and apply to every Simulation in the process.
 */
export class Simulation {
  readonly world: World;
  readonly ctx: GameContext;
  private readonly runner = new SystemRunner();
  private ticks = 0;

  constructor(options: SimulationOptions = {}) {
    this.world = createWorld();
    this.ctx = createGameContext(options.random ?? Math.random, options.sprites ?? headlessSprites);

    this.runner.register(new PlayerDirectionSystem(), SystemPriority.PLAYER_DIRECTION);
    this.runner.register(new MovementSystem(), SystemPriority.MOVEMENT);
    this.runner.register(new MonsterPursuitSystem(), SystemPriority.MONSTER_PURSUIT);
    this.runner.register(new LethalContactSystem(), SystemPriority.LETHAL_CONTACT);
    this.runner.register(new BodyCollisionSystem(), SystemPriority.BODY_COLLISION);
    this.runner.register(new BlastCollisionSystem(), SystemPriority.BLAST_COLLISION);
    this.runner.register(new BlastLifetimeSystem(), SystemPriority.BLAST_LIFETIME);
    this.runner.register(new MonsterSpawnSystem(), SystemPriority.MONSTER_SPAWN);
    this.runner.register(new BlastSpawnSystem(), SystemPriority.BLAST_SPAWN);
    this.runner.register(new NewGameSystem(), SystemPriority.NEW_GAME);
    this.runner.register(new ViewOffsetSystem(), SystemPriority.VIEW_OFFSET);

    this.requestNewGame('startup');
  }

  /**
   * Run the whole pipeline once.
   * Omitted intent means no direction held this tick.
   * Returns false when the tick was held back by the dev pause.
   */
  tick(deltaTime: number, intent: Intent = ZERO): boolean {
    if (!shouldRunTick()) return false;

    setPlayerIntent(this.world, intentToVector(intent));
    this.runner.update(this.world, deltaTime * getTimeScale(), this.ctx);
    this.ticks++;
    return true;
  }

  /**
   * Queue a reset. Applied at the end of the next tick; several requests
   * in one tick collapse into one reset.
   */
  requestNewGame(cause: NewGameCause = 'requested'): void {
    this.ctx.newGameEvents.push({ type: 'newGame', cause });
  }

  /**
   * Render data for every visible entity, as of the last view offset stage.
   */
  getRenderSnapshot(): RenderSnapshot[] {
    const snapshot: RenderSnapshot[] = [];

    for (const [entity, renderable] of this.world.getStore(Components.Renderable).entries()) {
      const role = getEntityRole(this.world, entity);
      if (!role) continue;

      const entry: RenderSnapshot = {
        entity,
        role,
        asset: renderable.asset,
        translation: { ...renderable.translation },
        scale: renderable.scale,
      };
      if (renderable.size !== undefined) {
        entry.size = renderable.size;
      }
      snapshot.push(entry);
    }

    return snapshot;
  }

  getStats(): AggregateStats {
    return calculateAggregateStats(this.world, this.ctx, this.ticks);
  }

  getSystemNames(): string[] {
    return this.runner.getSystemNames();
  }

  /**
   * Drop every entity and release sprites. The instance is not reused afterwards.
   */
  dispose(): void {
    for (const entity of this.world.getAllEntities()) {
      if (this.world.hasComponent(entity, Components.Renderable)) {
        this.ctx.sprites.destroy(entity);
      }
    }
    this.world.clear();
  }
}
