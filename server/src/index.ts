// ============================================
// Simulation Host
// Runs the simulation headless at a fixed rate
// ============================================

import { ZERO } from '@swarmfall/shared';
import { Simulation } from './simulation';
import { createWorldSnapshot } from './telemetry';
import {
  logger,
  perfLogger,
  logSimulationStarted,
  logAggregateStats,
  logWorldSnapshot,
} from './logger';

// ============================================
// Host Configuration
// ============================================

function readPositiveNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}

const TICK_RATE = readPositiveNumber('TICK_RATE', 60);
const TICK_INTERVAL = 1000 / TICK_RATE;
const STATS_INTERVAL_MS = readPositiveNumber('STATS_INTERVAL_SECONDS', 10) * 1000;
const SNAPSHOT_INTERVAL_MS = 60000;

// Ticks slower than this share of the interval are logged
const SLOW_TICK_RATIO = 0.5;

// ============================================
// Simulation State
// ============================================

const simulation = new Simulation();

// ============================================
// Game Loop
// ============================================

// Measured wall-clock delta, so a late timer still advances the right amount
let lastTickTime = performance.now();

const tickTimer = setInterval(() => {
  const now = performance.now();
  const deltaTime = (now - lastTickTime) / 1000;
  lastTickTime = now;

  // No input collaborator attached: nothing is ever held
  simulation.tick(deltaTime, ZERO);

  const tickMs = performance.now() - now;
  if (tickMs > TICK_INTERVAL * SLOW_TICK_RATIO) {
    perfLogger.info(
      { event: 'slow_tick', tickMs: parseFloat(tickMs.toFixed(2)), budgetMs: parseFloat(TICK_INTERVAL.toFixed(2)) },
      `Slow tick ${tickMs.toFixed(1)}ms (budget ${TICK_INTERVAL.toFixed(1)}ms)`
    );
  }
}, TICK_INTERVAL);

logSimulationStarted(TICK_RATE);

// ============================================
// Periodic Logging
// ============================================

// Helper to wrap interval callbacks in try-catch
const safeInterval = (name: string, callback: () => void, interval: number) =>
  setInterval(() => {
    try {
      callback();
    } catch (error) {
      logger.error(
        {
          event: 'interval_error',
          intervalName: name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        },
        `Interval ${name} threw an error`
      );
    }
  }, interval);

const statsTimer = safeInterval('aggregate_stats', () => logAggregateStats(simulation.getStats()), STATS_INTERVAL_MS);

const snapshotTimer = safeInterval(
  'world_snapshot',
  () => logWorldSnapshot(createWorldSnapshot(simulation.world)),
  SNAPSHOT_INTERVAL_MS
);

// ============================================
// Graceful Shutdown
// ============================================

/**
 * Handle graceful shutdown on SIGINT (Ctrl-C) or SIGTERM.
 * Stops the loop, flushes a final stats line and exits.
 */
function shutdown(signal: string) {
  logger.info({ event: 'shutdown_initiated', signal }, `Received ${signal}, shutting down...`);

  clearInterval(tickTimer);
  clearInterval(statsTimer);
  clearInterval(snapshotTimer);

  logAggregateStats(simulation.getStats());
  simulation.dispose();

  logger.info({ event: 'shutdown_complete' }, 'Simulation shut down cleanly');

  // Give the log transports a moment to flush
  setTimeout(() => process.exit(0), 250).unref();
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
