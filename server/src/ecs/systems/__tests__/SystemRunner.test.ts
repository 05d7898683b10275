// ============================================
// SystemRunner Unit Tests
// ============================================

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { World } from '@swarmfall/shared';
import { SystemRunner } from '../SystemRunner';
import type { System } from '../types';
import { logger } from '../../../logger';
import { createTestWorld, createTestContext } from './testUtils';
import type { GameContext } from '../GameContext';

class RecordingSystem implements System {
  constructor(readonly name: string, private readonly calls: string[]) {}

  update(_world: World, _deltaTime: number, _ctx: GameContext): void {
    this.calls.push(this.name);
  }
}

class BrokenSystem implements System {
  readonly name = 'BrokenSystem';

  update(): void {
    throw new Error('boom');
  }
}

describe('SystemRunner', () => {
  let world: ReturnType<typeof createTestWorld>;
  let ctx: GameContext;
  let runner: SystemRunner;

  beforeEach(() => {
    vi.clearAllMocks();
    world = createTestWorld();
    ctx = createTestContext();
    runner = new SystemRunner();
  });

  it('runs systems in priority order', () => {
    const calls: string[] = [];
    runner.register(new RecordingSystem('late', calls), 900);
    runner.register(new RecordingSystem('early', calls), 100);
    runner.register(new RecordingSystem('middle', calls), 500);

    runner.update(world, 0.016, ctx);

    expect(calls).toEqual(['early', 'middle', 'late']);
    expect(runner.getSystemNames()).toEqual([
      'early (priority: 100)',
      'middle (priority: 500)',
      'late (priority: 900)',
    ]);
  });

  it('logs a throwing system and keeps running the rest', () => {
    const calls: string[] = [];
    runner.register(new BrokenSystem(), 100);
    runner.register(new RecordingSystem('after', calls), 200);

    runner.update(world, 0.016, ctx);

    expect(calls).toEqual(['after']);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ event: 'system_error', system: 'BrokenSystem', error: 'boom' }),
      'System BrokenSystem threw an error'
    );
  });
});
