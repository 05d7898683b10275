// ============================================
// ECS Systems - Index
// ============================================

// Types
export type { System } from './types';
export { SystemPriority } from './types';

// Session state
export type { GameContext, MonsterStats } from './GameContext';
export { EventQueue, aliveCount, createGameContext } from './GameContext';

// Runner
export { SystemRunner } from './SystemRunner';

// Direction Systems
export { PlayerDirectionSystem } from './PlayerDirectionSystem';
export { MonsterPursuitSystem } from './MonsterPursuitSystem';

// Physics Systems
export { MovementSystem } from './MovementSystem';

// Collision Systems
export { LethalContactSystem } from './LethalContactSystem';
export { BodyCollisionSystem } from './BodyCollisionSystem';
export { BlastCollisionSystem } from './BlastCollisionSystem';

// Spawning Systems
export { BlastLifetimeSystem } from './BlastLifetimeSystem';
export { MonsterSpawnSystem } from './MonsterSpawnSystem';
export { BlastSpawnSystem } from './BlastSpawnSystem';

// Lifecycle Systems
export { NewGameSystem } from './NewGameSystem';

// Presentation Systems
export { ViewOffsetSystem } from './ViewOffsetSystem';
