// ============================================
// ECS World
// ============================================

import { ComponentStore } from './Component';
import { Components } from './types';
import type { ComponentMap, ComponentType, EntityId, Tag } from './types';

type StoreMap = { [K in ComponentType]: ComponentStore<ComponentMap[K]> };

/**
 * World - the central ECS container.
 *
 * Manages:
 * - Entity lifecycle (create, destroy)
 * - Component storage (add, get, remove) - one typed store per component
 * - Queries (find entities with specific components)
 * - Tags (entity roles)
 *
 * Session-wide state (stats, spawn timers, reset queue) is not kept here;
 * it is owned by the Simulation and passed to systems explicitly.
 */
export class World {
  private nextEntityId = 1;
  private entities = new Set<EntityId>();
  private entityTags = new Map<EntityId, Set<Tag>>();
  private readonly stores: StoreMap = {
    Position: new ComponentStore(Components.Position),
    Velocity: new ComponentStore(Components.Velocity),
    Body: new ComponentStore(Components.Body),
    Input: new ComponentStore(Components.Input),
    Blast: new ComponentStore(Components.Blast),
    Renderable: new ComponentStore(Components.Renderable),
  };

  // ============================================
  // Entity Lifecycle
  // ============================================

  createEntity(): EntityId {
    const id = this.nextEntityId++;
    this.entities.add(id);
    return id;
  }

  /**
   * Destroy an entity and all its components.
   * Destroying an unknown or already destroyed entity is a no-op.
   */
  destroyEntity(id: EntityId): void {
    if (!this.entities.has(id)) return;

    this.entities.delete(id);

    for (const store of Object.values(this.stores)) {
      store.delete(id);
    }

    this.entityTags.delete(id);
  }

  hasEntity(id: EntityId): boolean {
    return this.entities.has(id);
  }

  getAllEntities(): EntityId[] {
    return Array.from(this.entities);
  }

  get entityCount(): number {
    return this.entities.size;
  }

  // ============================================
  // Component Management
  // ============================================

  getStore<K extends ComponentType>(type: K): ComponentStore<ComponentMap[K]> {
    return this.stores[type];
  }

  /**
   * Add a component to an entity.
   * Throws if the entity does not exist.
   */
  addComponent<K extends ComponentType>(entity: EntityId, type: K, data: ComponentMap[K]): void {
    if (!this.entities.has(entity)) {
      throw new Error(`Cannot add ${type} to unknown entity ${entity}`);
    }
    this.stores[type].set(entity, data);
  }

  /**
   * Get a component from an entity.
   * Returns undefined if entity doesn't have the component.
   */
  getComponent<K extends ComponentType>(entity: EntityId, type: K): ComponentMap[K] | undefined {
    return this.stores[type].get(entity);
  }

  hasComponent(entity: EntityId, type: ComponentType): boolean {
    return this.stores[type].has(entity);
  }

  // ============================================
  // Queries
  // ============================================

  /**
   * Visit every entity that has ALL specified components, in creation order.
   *
   * Example: world.queryEach(['Position', 'Velocity'], (entity) => ...)
   */
  queryEach(types: ComponentType[], callback: (entity: EntityId) => void): void {
    for (const entity of this.entities) {
      if (types.every((type) => this.hasComponent(entity, type))) {
        callback(entity);
      }
    }
  }

  // ============================================
  // Tags
  // ============================================

  addTag(entity: EntityId, tag: Tag): void {
    let tags = this.entityTags.get(entity);
    if (!tags) {
      tags = new Set();
      this.entityTags.set(entity, tags);
    }
    tags.add(tag);
  }

  hasTag(entity: EntityId, tag: Tag): boolean {
    return this.entityTags.get(entity)?.has(tag) ?? false;
  }

  /**
   * Get all entities with a specific tag.
   * Returns a snapshot, safe to destroy entities while iterating it.
   */
  getEntitiesWithTag(tag: Tag): EntityId[] {
    const result: EntityId[] = [];
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        result.push(entity);
      }
    }
    return result;
  }

  /**
   * Iterate entities with tag via callback (avoids allocation).
   * Do not destroy entities from inside the callback.
   */
  forEachWithTag(tag: Tag, callback: (entity: EntityId) => void): void {
    for (const [entity, tags] of this.entityTags) {
      if (tags.has(tag)) {
        callback(entity);
      }
    }
  }

  countWithTag(tag: Tag): number {
    let count = 0;
    for (const tags of this.entityTags.values()) {
      if (tags.has(tag)) count++;
    }
    return count;
  }

  // ============================================
  // Utilities
  // ============================================

  /**
   * Clear all entities and components.
   */
  clear(): void {
    this.entities.clear();
    this.entityTags.clear();
    for (const store of Object.values(this.stores)) {
      store.clear();
    }
    this.nextEntityId = 1;
  }

  /**
   * Debug: get stats about the world.
   */
  getStats(): { entities: number; stores: Record<ComponentType, number> } {
    return {
      entities: this.entities.size,
      stores: {
        Position: this.stores.Position.size,
        Velocity: this.stores.Velocity.size,
        Body: this.stores.Body.size,
        Input: this.stores.Input.size,
        Blast: this.stores.Blast.size,
        Renderable: this.stores.Renderable.size,
      },
    };
  }
}
