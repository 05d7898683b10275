// ============================================
// Simulation End-to-End Tests
// ============================================

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Tags } from '@swarmfall/shared';
import { Simulation } from '../simulation';
import { createBlast, createMonster, getPlayerEntity, requirePosition, requireVelocity } from '../ecs';
import { resetDevState, setConfigOverride, setPaused, setTimeScale, stepTick } from '../dev';
import { createRecordingSprites, fixedRandom, type RecordingSprites } from '../ecs/systems/__tests__/testUtils';

describe('Simulation', () => {
  let sprites: RecordingSprites;
  let sim: Simulation;

  beforeEach(() => {
    sprites = createRecordingSprites();
    sim = new Simulation({ random: fixedRandom(0), sprites });
  });

  afterEach(() => {
    resetDevState();
  });

  describe('session lifecycle', () => {
    it('starts the first session on the first tick', () => {
      expect(sim.world.entityCount).toBe(0);

      expect(sim.tick(0.016)).toBe(true);

      expect(sim.getStats()).toEqual({
        ticks: 1,
        sessions: 1,
        spawned: 0,
        killed: 0,
        alive: 0,
        blasts: 0,
        entities: 1,
      });
      expect(sprites.created).toHaveLength(1);
    });

    it('resets the session when a monster reaches the player', () => {
      sim.tick(0.016);
      createMonster(sim.world, { x: 0, y: 0 }, sprites);
      sim.ctx.stats.spawned = 1;

      sim.tick(0.016);

      const player = getPlayerEntity(sim.world);
      expect(player).toBeDefined();
      if (player === undefined) return;
      expect(requirePosition(sim.world, player).current).toEqual({ x: 0, y: 0 });
      expect(sim.world.countWithTag(Tags.Player)).toBe(1);
      expect(sim.world.countWithTag(Tags.Monster)).toBe(0);
      expect(sim.world.countWithTag(Tags.Blast)).toBe(0);
      expect(sim.ctx.stats).toEqual({ spawned: 0, killed: 0 });
      expect(sim.getStats().sessions).toBe(2);
    });

    it('collapses several reset requests into one', () => {
      sim.tick(0.016);
      sim.requestNewGame();
      sim.requestNewGame();
      sim.requestNewGame('caught');

      sim.tick(0.016);

      expect(sim.getStats().sessions).toBe(2);
      expect(sim.world.countWithTag(Tags.Player)).toBe(1);
    });
  });

  describe('blasts', () => {
    it('kills a monster caught by two overlapping blasts exactly once', () => {
      sim.tick(0.016);
      createBlast(sim.world, { x: 0, y: 0 }, sprites);
      createBlast(sim.world, { x: 0, y: 0 }, sprites);
      createMonster(sim.world, { x: 30, y: 0 }, sprites);
      sim.ctx.stats.spawned = 1;

      sim.tick(0.016);

      expect(sim.getStats()).toMatchObject({ spawned: 1, killed: 1, alive: 0, blasts: 2, entities: 3 });
    });
  });

  describe('pipeline order', () => {
    it('registers the stages in tick order', () => {
      expect(sim.getSystemNames()).toEqual([
        'PlayerDirectionSystem (priority: 100)',
        'MovementSystem (priority: 200)',
        'MonsterPursuitSystem (priority: 300)',
        'LethalContactSystem (priority: 400)',
        'BodyCollisionSystem (priority: 410)',
        'BlastCollisionSystem (priority: 420)',
        'BlastLifetimeSystem (priority: 500)',
        'MonsterSpawnSystem (priority: 600)',
        'BlastSpawnSystem (priority: 610)',
        'NewGameSystem (priority: 700)',
        'ViewOffsetSystem (priority: 900)',
      ]);
    });

    it('aims monsters at the player position reached this tick', () => {
      sim.tick(0.016);
      const monster = createMonster(sim.world, { x: 100, y: 50 }, sprites);

      // Player moves from (0, 0) to (50, 0) before pursuit runs
      sim.tick(0.5, { up: false, down: false, left: false, right: true });

      const direction = requireVelocity(sim.world, monster).direction;
      expect(direction.x).toBeCloseTo(-Math.SQRT1_2);
      expect(direction.y).toBeCloseTo(-Math.SQRT1_2);
    });
  });

  describe('config overrides', () => {
    it('keeps spawning blasts after a zero lifetime is rejected', () => {
      expect(() => setConfigOverride('BLAST_LIFETIME_SECONDS', 0)).toThrow();
      sim.tick(0.016);

      // One monster (0.6s period) and one blast (3s period)
      sim.tick(3.1);

      expect(sim.getStats()).toMatchObject({ blasts: 1, entities: 3 });
      expect(sim.world.countWithTag(Tags.Monster)).toBe(1);
    });
  });

  describe('ticking', () => {
    it('moves the player from held keys and keeps it centered in the view', () => {
      setTimeScale(2);
      sim.tick(0.016);

      // Scaled delta 1s: player moves 100, monster timer (0.6s) fires once
      sim.tick(0.5, { up: false, down: false, left: false, right: true });

      const player = getPlayerEntity(sim.world);
      expect(player).toBeDefined();
      if (player === undefined) return;
      expect(requirePosition(sim.world, player).current).toEqual({ x: 100, y: 0 });

      const snapshot = sim.getRenderSnapshot();
      expect(snapshot.find((entry) => entry.role === 'player')).toEqual({
        entity: player,
        role: 'player',
        asset: 'player.png',
        translation: { x: 0, y: 0 },
        scale: 4,
      });
      expect(snapshot.find((entry) => entry.role === 'monster')?.translation).toEqual({ x: 300, y: 0 });
    });

    it('holds ticks while paused and runs exactly one per step', () => {
      setPaused(true);

      expect(sim.tick(0.016)).toBe(false);
      expect(sim.getStats().ticks).toBe(0);

      stepTick();
      expect(sim.tick(0.016)).toBe(true);
      expect(sim.world.entityCount).toBe(1);

      expect(sim.tick(0.016)).toBe(false);
    });
  });

  describe('dispose', () => {
    it('releases every sprite and empties the world', () => {
      sim.tick(0.016);
      const monster = createMonster(sim.world, { x: 200, y: 0 }, sprites);

      sim.dispose();

      expect(sim.world.entityCount).toBe(0);
      expect(sprites.destroyed).toContain(monster);
    });
  });
});
