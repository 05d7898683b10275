// ============================================
// Telemetry Module
// Functions for calculating aggregate simulation statistics
// and creating world snapshots for logging
// ============================================

import { Components, Tags, type ComponentType, type Vec2, type World } from '@swarmfall/shared';
import { aliveCount, getEntityRole, type GameContext } from './ecs';

/**
 * Aggregate statistics about the simulation
 */
export interface AggregateStats {
  ticks: number;
  sessions: number;
  spawned: number;
  killed: number;
  alive: number;
  blasts: number;
  entities: number;
}

/**
 * Entity snapshot for world state logging
 */
export interface EntitySnapshot {
  entity: number;
  role: string;
  position: Vec2;
}

/**
 * Complete world snapshot (debug dumps)
 */
export interface WorldSnapshot {
  timestamp: number;
  entities: EntitySnapshot[];
  // Entries per component store
  components: Record<ComponentType, number>;
}

/**
 * Calculate aggregate statistics about the simulation
 */
export function calculateAggregateStats(world: World, ctx: GameContext, ticks: number): AggregateStats {
  return {
    ticks,
    sessions: ctx.sessions,
    spawned: ctx.stats.spawned,
    killed: ctx.stats.killed,
    alive: aliveCount(ctx.stats),
    blasts: world.countWithTag(Tags.Blast),
    entities: world.entityCount,
  };
}

/**
 * Create a world snapshot with every positioned entity
 */
export function createWorldSnapshot(world: World): WorldSnapshot {
  const entities: EntitySnapshot[] = [];

  for (const [entity, position] of world.getStore(Components.Position).entries()) {
    entities.push({
      entity,
      role: getEntityRole(world, entity) ?? 'unknown',
      position: { x: position.current.x, y: position.current.y },
    });
  }

  return { timestamp: Date.now(), entities, components: world.getStats().stores };
}
