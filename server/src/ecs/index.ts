// ============================================
// ECS - Entity Component System
// ============================================

// Core types, classes, and components from shared package
export {
  World,
  ComponentStore,
  Components,
  Tags,
} from '@swarmfall/shared';
export type {
  EntityId,
  ComponentType,
  // Component interfaces
  PositionComponent,
  VelocityComponent,
  BodyComponent,
  InputComponent,
  BlastComponent,
  RenderableComponent,
} from '@swarmfall/shared';

// Factories and World Setup
export {
  createWorld,
  createPlayer,
  createMonster,
  createBlast,
  destroyEntity,
  destroyAllEntities,
  headlessSprites,
  // Lookups
  getPlayerEntity,
  getEntityRole,
  setPlayerIntent,
  // Direct component access
  requirePosition,
  requireVelocity,
  requireBody,
  requireInput,
  requireBlast,
  requireRenderable,
} from './factories';

// Systems
export * from './systems';
