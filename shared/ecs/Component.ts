// ============================================
// Component Store
// ============================================

import type { EntityId } from './types';

/**
 * ComponentStore - one Map<EntityId, T> per component type.
 *
 * Iteration follows insertion order, so systems that scan a store see
 * entities in the order they were given the component.
 */
export class ComponentStore<T> {
  private data = new Map<EntityId, T>();

  constructor(readonly type: string) {}

  /**
   * Set component data for an entity. Overwrites existing data if present.
   */
  set(entity: EntityId, value: T): void {
    this.data.set(entity, value);
  }

  get(entity: EntityId): T | undefined {
    return this.data.get(entity);
  }

  /**
   * Get component data, throwing if the entity lacks it.
   * For call sites where absence means a wiring bug, not a game state.
   */
  require(entity: EntityId): T {
    const value = this.data.get(entity);
    if (value === undefined) {
      throw new Error(`EntityMissingComponent: ${this.type} missing on entity ${entity}`);
    }
    return value;
  }

  has(entity: EntityId): boolean {
    return this.data.has(entity);
  }

  delete(entity: EntityId): void {
    this.data.delete(entity);
  }

  entries(): IterableIterator<[EntityId, T]> {
    return this.data.entries();
  }

  get size(): number {
    return this.data.size;
  }

  clear(): void {
    this.data.clear();
  }
}
