import pino from 'pino';
import type { NewGameCause, Vec2 } from '@swarmfall/shared';
import type { AggregateStats, WorldSnapshot } from './telemetry';

// ============================================
// Logger Configuration
// ============================================

const LOG_DIR = process.env.LOG_DIR || 'logs';
const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const IS_DEV = process.env.NODE_ENV !== 'production';

/**
 * Create a logger with console + rotating file output
 * pino-roll is used as a Pino transport for file rotation
 * @param filename - Log file name (e.g., 'simulation.log')
 * @param component - Component name for filtering (e.g., 'sim', 'perf')
 */
function createLogger(filename: string, component: string) {
  const targets: pino.TransportTargetOptions[] = [];

  // Console stream with pretty printing (development only)
  if (IS_DEV) {
    targets.push({
      level: LOG_LEVEL,
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss.l',
        ignore: 'pid,hostname',
      },
    });
  }

  // Rotating file stream with JSON (always enabled)
  targets.push({
    level: 'info',
    target: 'pino-roll',
    options: {
      file: `${LOG_DIR}/${filename}`,
      size: '10m',         // Rotate at 10MB
      limit: { count: 5 }, // Keep last 5 rotated files
      mkdir: true,
    },
  });

  return pino(
    {
      level: LOG_LEVEL,
      base: { component },
    },
    pino.transport({ targets })
  );
}

// ============================================
// Logger Instances
// ============================================

// Game events (sessions, deaths, spawn policy)
export const logger = createLogger('simulation.log', 'sim');

// Tick timing
export const perfLogger = createLogger('performance.log', 'perf');

// ============================================
// Convenience Methods for Game Events
// ============================================

/**
 * Log simulation host startup
 */
export function logSimulationStarted(tickRate: number) {
  logger.info({ tickRate, event: 'simulation_started' }, `Simulation running at ${tickRate} ticks/s`);
}

/**
 * Log a session (re)start
 */
export function logNewGame(cause: NewGameCause, signals: number, cleared: number) {
  logger.info(
    { cause, signals, cleared, event: 'new_game' },
    `New game (${cause}), cleared ${cleared} entities`
  );
}

/**
 * Log the player being caught by a monster
 */
export function logPlayerCaught(position: Vec2, monsterCount: number) {
  logger.info(
    { position, monsterCount, event: 'player_caught' },
    `Player caught at (${position.x.toFixed(0)}, ${position.y.toFixed(0)}) with ${monsterCount} monsters alive`
  );
}

/**
 * Log a monster spawn skipped by the population cap
 */
export function logMonsterSpawnSkipped(alive: number, limit: number) {
  logger.debug({ alive, limit, event: 'monster_spawn_capped' }, `Monster spawn skipped: ${alive}/${limit} alive`);
}

// ============================================
// Simulation State Logging
// ============================================

/**
 * Log aggregate simulation statistics (lightweight, periodic)
 */
export function logAggregateStats(stats: AggregateStats) {
  logger.info(
    {
      ...stats,
      event: 'aggregate_stats',
    },
    `Stats: ${stats.alive} monsters alive (${stats.spawned} spawned, ${stats.killed} killed), ${stats.blasts} blasts, session #${stats.sessions}`
  );
}

/**
 * Log a full world snapshot (every entity position)
 */
export function logWorldSnapshot(snapshot: WorldSnapshot) {
  logger.debug(
    { ...snapshot, event: 'world_snapshot' },
    `World snapshot: ${snapshot.entities.length} entities`
  );
}
