// ============================================
// ECS System Runner
// Manages and executes all simulation stages in priority order
// ============================================

import type { World } from '@swarmfall/shared';
import type { System } from './types';
import type { GameContext } from './GameContext';
import { logger, perfLogger } from '../../logger';

// Ticks slower than this get a per-system breakdown in performance.log
const SLOW_TICK_MS = 10;

/**
 * Registered system with its priority
 */
interface RegisteredSystem {
  system: System;
  priority: number;
}

/**
 * SystemRunner - Manages and executes all systems
 *
 * Systems are executed in priority order (lower numbers first).
 * Systems registered with equal priority keep registration order.
 */
export class SystemRunner {
  private systems: RegisteredSystem[] = [];

  /**
   * Register a system with a priority
   * @param system The system to register
   * @param priority Lower numbers run first
   */
  register(system: System, priority: number): void {
    this.systems.push({ system, priority });
    this.systems.sort((a, b) => a.priority - b.priority);
  }

  /**
   * Run all systems in priority order
   * Tracks per-system timing and logs when tick is slow
   */
  update(world: World, deltaTime: number, ctx: GameContext): void {
    const tickStart = performance.now();
    const timings: { name: string; ms: number }[] = [];

    for (const { system } of this.systems) {
      const systemStart = performance.now();
      try {
        system.update(world, deltaTime, ctx);
      } catch (error) {
        logger.error({
          event: 'system_error',
          system: system.name,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
        }, `System ${system.name} threw an error`);
        // Continue with next system - one faulty stage must not stop the loop
      }
      timings.push({ name: system.name, ms: performance.now() - systemStart });
    }

    const totalMs = performance.now() - tickStart;

    if (totalMs > SLOW_TICK_MS) {
      // Slowest first
      const sorted = timings.filter(t => t.ms > 0.5).sort((a, b) => b.ms - a.ms);
      const breakdown = sorted.map(t => `${t.name}:${t.ms.toFixed(1)}`).join(' ');

      perfLogger.info({
        event: 'slow_tick_breakdown',
        totalMs: totalMs.toFixed(1),
        breakdown: sorted.map(t => ({ name: t.name, ms: parseFloat(t.ms.toFixed(2)) })),
      }, `Slow tick ${totalMs.toFixed(1)}ms: ${breakdown}`);
    }
  }

  /**
   * Get list of registered systems in run order (for debugging)
   */
  getSystemNames(): string[] {
    return this.systems.map(s => `${s.system.name} (priority: ${s.priority})`);
  }
}
