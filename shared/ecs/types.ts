// ============================================
// ECS Core Types
// ============================================

import type {
  BlastComponent,
  BodyComponent,
  InputComponent,
  PositionComponent,
  RenderableComponent,
  VelocityComponent,
} from './components';

/**
 * Entity ID - just a number.
 * Entities have no data themselves, they're just IDs that
 * components are attached to.
 */
export type EntityId = number;

/**
 * Standard component types used throughout the ECS.
 * Using const object for type safety while keeping string values.
 */
export const Components = {
  // Core components
  Position: 'Position',
  Velocity: 'Velocity',
  Body: 'Body',

  // Player-specific components
  Input: 'Input',

  // Entity-type components
  Blast: 'Blast',

  // Presentation
  Renderable: 'Renderable',
} as const;

/**
 * Component data shape for each component type.
 */
export interface ComponentMap {
  Position: PositionComponent;
  Velocity: VelocityComponent;
  Body: BodyComponent;
  Input: InputComponent;
  Blast: BlastComponent;
  Renderable: RenderableComponent;
}

/**
 * Component type identifier - string key for component stores.
 */
export type ComponentType = keyof ComponentMap;

/**
 * Entity role tags. Every live entity carries exactly one.
 */
export const Tags = {
  Player: 'player',
  Monster: 'monster',
  Blast: 'blast',
} as const;

export type Tag = (typeof Tags)[keyof typeof Tags];
