// ============================================
// Game Constants & Configuration
// Runtime-tunable values and static configuration
// ============================================

// Runtime config that can be modified (subset of GAME_CONFIG keys)
export const DEV_TUNABLE_CONFIGS = [
  // Player
  'PLAYER_SPEED',

  // Monsters
  'MONSTER_SPEED',
  'MONSTER_SPAWN_DISTANCE',
  'MONSTER_SPAWN_LIMIT',

  // Blasts
  'BLAST_RADIUS',
  'BLAST_LIFETIME_SECONDS',

  // Collision
  'COLLISION_DISPLACEMENT_FACTOR',
] as const;

export type TunableConfigKey = (typeof DEV_TUNABLE_CONFIGS)[number];

// ============================================
// Game Constants
// Distances in world units, speeds in units per second
// ============================================

export const GAME_CONFIG = {
  // Player (immovable body - pushes monsters, never pushed)
  PLAYER_SPEED: 100,
  PLAYER_BODY_RADIUS: 18,
  PLAYER_SCALE: 4, // Sprite scale hint for the renderer

  // Monsters
  MONSTER_SPEED: 50,
  MONSTER_BODY_RADIUS: 10,
  MONSTER_BODY_MASS: 10,
  MONSTER_SCALE: 2,

  // Monster spawning (ring around the player)
  MONSTER_SPAWN_DISTANCE: 300,
  MONSTER_SPAWN_LIMIT: 300, // Max alive monsters (spawned - killed)
  MONSTER_SPAWN_PERIOD_SECONDS: 0.6,

  // Blasts (area damage centered on the player)
  BLAST_RADIUS: 50,
  BLAST_LIFETIME_SECONDS: 0.3,
  BLAST_SPAWN_PERIOD_SECONDS: 3.0,

  // Share of the accumulated push applied per tick (smooths multi-body pileups)
  COLLISION_DISPLACEMENT_FACTOR: 0.2,
};

export type GameConfig = typeof GAME_CONFIG;
