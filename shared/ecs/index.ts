// ============================================
// ECS Package Exports
// ============================================

// Core ECS classes
export { World } from './World';
export { ComponentStore } from './Component';

// Types and constants
export { Components, Tags } from './types';
export type { EntityId, ComponentType, ComponentMap, Tag } from './types';

// Component interfaces
export type {
  PositionComponent,
  VelocityComponent,
  BodyComponent,
  InputComponent,
  BlastComponent,
  RenderableComponent,
} from './components';
