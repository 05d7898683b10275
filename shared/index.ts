// ============================================
// Shared Simulation Primitives
// Host-independent code used by the simulation and its collaborators
// ============================================

// ECS Module - World, stores, component shapes
export * from './ecs';

// Vector math
export * from './math';

// Circle overlap and position/velocity rules
export * from './physics';

// Countdown timers
export * from './timer';

// Directional input resolution
export * from './input';

// Game constants (GAME_CONFIG, DEV_TUNABLE_CONFIGS)
export * from './constants';

// Type definitions (Vec2, events, render contract)
export * from './types';
