// ============================================
// Game Context
// Session-wide state passed to all ECS systems
// ============================================

import { Timer } from '@swarmfall/shared';
import type { NewGameEvent, RandomSource, SpriteFactory } from '@swarmfall/shared';
import { getConfig } from '../../dev';

/**
 * Monster population counters for the current session.
 */
export interface MonsterStats {
  spawned: number;
  killed: number;
}

export function aliveCount(stats: MonsterStats): number {
  return Math.max(stats.spawned - stats.killed, 0);
}

/**
 * FIFO of one-shot signals. Producers push during a tick,
 * a single consumer drains them.
 */
export class EventQueue<T> {
  private pending: T[] = [];

  push(event: T): void {
    this.pending.push(event);
  }

  /**
   * Take every queued event, leaving the queue empty.
   */
  drain(): T[] {
    const events = this.pending;
    this.pending = [];
    return events;
  }

  get length(): number {
    return this.pending.length;
  }
}

/**
 * GameContext - everything systems share besides the World.
 *
 * Owned by the Simulation; systems never hold on to it between ticks.
 */
export interface GameContext {
  stats: MonsterStats;

  // Spawn throttles - start paused, unpaused by a new game
  monsterSpawnTimer: Timer;
  blastSpawnTimer: Timer;

  // Reset signals, collapsed into one reset per tick by NewGameSystem
  newGameEvents: EventQueue<NewGameEvent>;

  random: RandomSource;
  sprites: SpriteFactory;

  // Sessions started so far (incremented on every reset)
  sessions: number;
}

export function createGameContext(random: RandomSource, sprites: SpriteFactory): GameContext {
  const monsterSpawnTimer = new Timer(getConfig('MONSTER_SPAWN_PERIOD_SECONDS'), 'repeating');
  const blastSpawnTimer = new Timer(getConfig('BLAST_SPAWN_PERIOD_SECONDS'), 'repeating');
  monsterSpawnTimer.pause();
  blastSpawnTimer.pause();

  return {
    stats: { spawned: 0, killed: 0 },
    monsterSpawnTimer,
    blastSpawnTimer,
    newGameEvents: new EventQueue<NewGameEvent>(),
    random,
    sprites,
    sessions: 0,
  };
}
