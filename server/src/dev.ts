// ============================================
// Dev Controls
// Live config tuning and tick stepping
// ============================================

import {
  GAME_CONFIG,
  DEV_TUNABLE_CONFIGS,
  type GameConfig,
  type TunableConfigKey,
} from '@swarmfall/shared';
import { logger } from './logger';

// ============================================
// Dev State
// ============================================

// Runtime config overrides (applied on top of GAME_CONFIG)
const configOverrides = new Map<TunableConfigKey, number>();

let isPaused = false;
let timeScale = 1.0;

// Step flag for single-tick advancement when paused
let shouldStepTick = false;

// ============================================
// Config Access (with overrides)
// ============================================

// What each tunable accepts
type ValueRule = 'nonNegative' | 'positive' | 'count' | 'fraction';

const TUNABLE_RULES: Record<TunableConfigKey, ValueRule> = {
  PLAYER_SPEED: 'nonNegative',
  MONSTER_SPEED: 'nonNegative',
  MONSTER_SPAWN_DISTANCE: 'positive',
  MONSTER_SPAWN_LIMIT: 'count',
  BLAST_RADIUS: 'positive', // Circles need radius > 0
  BLAST_LIFETIME_SECONDS: 'positive', // Timers need duration > 0
  COLLISION_DISPLACEMENT_FACTOR: 'fraction',
};

const RULE_DESCRIPTIONS: Record<ValueRule, string> = {
  nonNegative: 'a number >= 0',
  positive: 'a number > 0',
  count: 'a whole number >= 0',
  fraction: 'a number between 0 and 1',
};

function satisfiesRule(rule: ValueRule, value: number): boolean {
  if (!Number.isFinite(value)) return false;
  switch (rule) {
    case 'nonNegative':
      return value >= 0;
    case 'positive':
      return value > 0;
    case 'count':
      return Number.isInteger(value) && value >= 0;
    case 'fraction':
      return value >= 0 && value <= 1;
  }
}

export function isTunableConfigKey(key: string): key is TunableConfigKey {
  return DEV_TUNABLE_CONFIGS.some((tunable) => tunable === key);
}

/**
 * Get a config value, checking overrides first
 */
export function getConfig(key: keyof GameConfig): number {
  if (isTunableConfigKey(key)) {
    const override = configOverrides.get(key);
    if (override !== undefined) {
      return override;
    }
  }
  return GAME_CONFIG[key];
}

/**
 * Override a tunable config value until cleared.
 * Throws for keys outside DEV_TUNABLE_CONFIGS and for values the key cannot take
 * (radii, lifetimes and the spawn distance must be positive, the spawn limit whole).
 */
export function setConfigOverride(key: string, value: number): void {
  if (!isTunableConfigKey(key)) {
    throw new Error(`Config key is not tunable: ${key}`);
  }
  const rule = TUNABLE_RULES[key];
  if (!satisfiesRule(rule, value)) {
    throw new Error(`Invalid value for ${key}: ${value} (expected ${RULE_DESCRIPTIONS[rule]})`);
  }

  const previous = getConfig(key);
  configOverrides.set(key, value);
  logger.info({ event: 'config_override', key, previous, value }, `Config ${key}: ${previous} -> ${value}`);
}

// ============================================
// Tick Control
// ============================================

export function isGamePaused(): boolean {
  return isPaused;
}

export function setPaused(paused: boolean): void {
  isPaused = paused;
  logger.info({ event: 'dev_pause', paused }, paused ? 'Simulation paused' : 'Simulation resumed');
}

/**
 * Request one tick while paused
 */
export function stepTick(): void {
  shouldStepTick = true;
}

export function getTimeScale(): number {
  return timeScale;
}

export function setTimeScale(scale: number): void {
  if (!Number.isFinite(scale) || scale < 0) {
    throw new Error(`Invalid time scale: ${scale}`);
  }
  timeScale = scale;
}

/**
 * Check if we should run a tick (always, unless paused without a pending step)
 */
export function shouldRunTick(): boolean {
  if (!isPaused) return true;
  if (shouldStepTick) {
    shouldStepTick = false;
    return true;
  }
  return false;
}

/**
 * Restore defaults (tests and host restarts)
 */
export function resetDevState(): void {
  configOverrides.clear();
  isPaused = false;
  timeScale = 1.0;
  shouldStepTick = false;
}
