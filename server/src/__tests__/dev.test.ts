// ============================================
// Dev Controls Tests
// ============================================

import { describe, it, expect, afterEach } from 'vitest';
import {
  getConfig,
  setConfigOverride,
  resetDevState,
  isGamePaused,
  setPaused,
  stepTick,
  shouldRunTick,
  getTimeScale,
  setTimeScale,
} from '../dev';
import { createWorld, createMonster, headlessSprites, requireVelocity } from '../ecs';

describe('dev controls', () => {
  afterEach(() => {
    resetDevState();
  });

  describe('config overrides', () => {
    it('falls back to the default value', () => {
      expect(getConfig('MONSTER_SPEED')).toBe(50);
    });

    it('applies an override to newly created entities', () => {
      setConfigOverride('MONSTER_SPEED', 75);

      const world = createWorld();
      const monster = createMonster(world, { x: 0, y: 0 }, headlessSprites);

      expect(getConfig('MONSTER_SPEED')).toBe(75);
      expect(requireVelocity(world, monster).speed).toBe(75);
    });

    it('rejects keys that are not tunable', () => {
      expect(() => setConfigOverride('PLAYER_BODY_RADIUS', 5)).toThrow(
        'Config key is not tunable: PLAYER_BODY_RADIUS'
      );
    });

    it('rejects negative and non-finite values', () => {
      expect(() => setConfigOverride('MONSTER_SPEED', -1)).toThrow('Invalid value for MONSTER_SPEED: -1');
      expect(() => setConfigOverride('MONSTER_SPEED', Infinity)).toThrow(
        'Invalid value for MONSTER_SPEED: Infinity'
      );
    });

    it('rejects zero for radii, lifetimes and the spawn distance', () => {
      expect(() => setConfigOverride('BLAST_LIFETIME_SECONDS', 0)).toThrow(
        'Invalid value for BLAST_LIFETIME_SECONDS: 0 (expected a number > 0)'
      );
      expect(() => setConfigOverride('BLAST_RADIUS', 0)).toThrow('Invalid value for BLAST_RADIUS: 0');
      expect(() => setConfigOverride('MONSTER_SPAWN_DISTANCE', 0)).toThrow(
        'Invalid value for MONSTER_SPAWN_DISTANCE: 0'
      );
      expect(getConfig('BLAST_LIFETIME_SECONDS')).toBe(0.3);
      expect(getConfig('BLAST_RADIUS')).toBe(50);
    });

    it('only takes a whole spawn limit', () => {
      expect(() => setConfigOverride('MONSTER_SPAWN_LIMIT', 2.5)).toThrow(
        'Invalid value for MONSTER_SPAWN_LIMIT: 2.5 (expected a whole number >= 0)'
      );

      setConfigOverride('MONSTER_SPAWN_LIMIT', 0);
      expect(getConfig('MONSTER_SPAWN_LIMIT')).toBe(0);
    });

    it('keeps the displacement factor within 0 and 1', () => {
      expect(() => setConfigOverride('COLLISION_DISPLACEMENT_FACTOR', 1.5)).toThrow(
        'Invalid value for COLLISION_DISPLACEMENT_FACTOR: 1.5 (expected a number between 0 and 1)'
      );

      setConfigOverride('COLLISION_DISPLACEMENT_FACTOR', 1);
      expect(getConfig('COLLISION_DISPLACEMENT_FACTOR')).toBe(1);
    });

    it('lets speeds drop to zero', () => {
      setConfigOverride('MONSTER_SPEED', 0);
      expect(getConfig('MONSTER_SPEED')).toBe(0);
    });

    it('drops overrides on reset', () => {
      setConfigOverride('BLAST_RADIUS', 80);
      resetDevState();

      expect(getConfig('BLAST_RADIUS')).toBe(50);
    });
  });

  describe('tick control', () => {
    it('runs every tick unless paused', () => {
      expect(isGamePaused()).toBe(false);
      expect(shouldRunTick()).toBe(true);

      setPaused(true);
      expect(shouldRunTick()).toBe(false);

      stepTick();
      expect(shouldRunTick()).toBe(true);
      expect(shouldRunTick()).toBe(false);
    });

    it('validates the time scale', () => {
      setTimeScale(0.5);
      expect(getTimeScale()).toBe(0.5);

      expect(() => setTimeScale(Number.NaN)).toThrow('Invalid time scale: NaN');
    });
  });
});
