// ============================================
// ECS Entity Factories
// Functions to create entities with proper components
// ============================================

import { World, Components, Tags, Timer, ZERO, vec2 } from '@swarmfall/shared';
import type {
  AssetId,
  BlastComponent,
  BodyComponent,
  EntityId,
  EntityRole,
  InputComponent,
  PositionComponent,
  RenderableComponent,
  SpriteFactory,
  Tag,
  Vec2,
  VelocityComponent,
} from '@swarmfall/shared';
import { getConfig } from '../dev';

// ============================================
// World Setup
// ============================================

/**
 * Create an empty ECS World. Component stores are built by the World itself.
 */
export function createWorld(): World {
  return new World();
}

/**
 * Sprite factory that draws nothing (headless host, tests).
 */
export const headlessSprites: SpriteFactory = {
  create: () => {},
  destroy: () => {},
};

// ============================================
// Entity Creation
// ============================================

function addRenderable(
  world: World,
  entity: EntityId,
  sprites: SpriteFactory,
  asset: AssetId,
  scale: number,
  size?: number
): void {
  const renderable: RenderableComponent = { asset, scale, translation: { ...ZERO } };
  if (size !== undefined) {
    renderable.size = size;
  }
  world.addComponent(entity, Components.Renderable, renderable);
  sprites.create(entity, asset, { translation: { ...ZERO }, scale, size });
}

/**
 * Create the player at the origin.
 * Immovable body: pushes monsters out of the way, never gets pushed.
 */
export function createPlayer(world: World, sprites: SpriteFactory): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { current: vec2(0, 0), change: vec2(0, 0) });
  world.addComponent(entity, Components.Velocity, {
    direction: vec2(0, 0),
    speed: getConfig('PLAYER_SPEED'),
  });
  world.addComponent(entity, Components.Body, {
    radius: getConfig('PLAYER_BODY_RADIUS'),
    mass: null,
  });
  world.addComponent(entity, Components.Input, { direction: vec2(0, 0) });
  world.addTag(entity, Tags.Player);

  addRenderable(world, entity, sprites, 'player.png', getConfig('PLAYER_SCALE'));

  return entity;
}

/**
 * Create a monster at a position. Its heading is set by MonsterPursuitSystem.
 */
export function createMonster(world: World, position: Vec2, sprites: SpriteFactory): EntityId {
  const entity = world.createEntity();

  world.addComponent(entity, Components.Position, { current: { ...position }, change: vec2(0, 0) });
  world.addComponent(entity, Components.Velocity, {
    direction: vec2(0, 0),
    speed: getConfig('MONSTER_SPEED'),
  });
  world.addComponent(entity, Components.Body, {
    radius: getConfig('MONSTER_BODY_RADIUS'),
    mass: getConfig('MONSTER_BODY_MASS'),
  });
  world.addTag(entity, Tags.Monster);

  addRenderable(world, entity, sprites, 'monster.png', getConfig('MONSTER_SCALE'));

  return entity;
}

/**
 * Create a blast at a position with a single-shot lifetime.
 * The sprite is drawn at the blast's diameter.
 */
export function createBlast(world: World, position: Vec2, sprites: SpriteFactory): EntityId {
  // Built first: a rejected duration must not leave a half-made entity behind
  const lifetime = new Timer(getConfig('BLAST_LIFETIME_SECONDS'), 'once');
  const radius = getConfig('BLAST_RADIUS');

  const entity = world.createEntity();
  world.addComponent(entity, Components.Position, { current: { ...position }, change: vec2(0, 0) });
  world.addComponent(entity, Components.Blast, { lifetime, radius });
  world.addTag(entity, Tags.Blast);

  addRenderable(world, entity, sprites, 'blast.png', 1, radius * 2);

  return entity;
}

/**
 * Destroy an entity and release its sprite.
 * Unknown or already destroyed entities are ignored.
 */
export function destroyEntity(world: World, entity: EntityId, sprites: SpriteFactory): void {
  if (!world.hasEntity(entity)) return;
  if (world.hasComponent(entity, Components.Renderable)) {
    sprites.destroy(entity);
  }
  world.destroyEntity(entity);
}

/**
 * Destroy every entity in the world. Returns how many were removed.
 */
export function destroyAllEntities(world: World, sprites: SpriteFactory): number {
  const entities = world.getAllEntities();
  for (const entity of entities) {
    destroyEntity(world, entity, sprites);
  }
  return entities.length;
}

// ============================================
// Lookups
// ============================================

/**
 * The player entity, or undefined between sessions.
 */
export function getPlayerEntity(world: World): EntityId | undefined {
  return world.getEntitiesWithTag(Tags.Player)[0];
}

const ROLE_TAGS: ReadonlyArray<[Tag, EntityRole]> = [
  [Tags.Player, 'player'],
  [Tags.Monster, 'monster'],
  [Tags.Blast, 'blast'],
];

export function getEntityRole(world: World, entity: EntityId): EntityRole | undefined {
  for (const [tag, role] of ROLE_TAGS) {
    if (world.hasTag(entity, tag)) return role;
  }
  return undefined;
}

/**
 * Set the player's raw movement intent. Returns false when there is no player.
 */
export function setPlayerIntent(world: World, intent: Vec2): boolean {
  const player = getPlayerEntity(world);
  if (player === undefined) return false;
  const input = world.getComponent(player, Components.Input);
  if (!input) return false;
  input.direction.x = intent.x;
  input.direction.y = intent.y;
  return true;
}

// ============================================
// Component Access
// Throws if component is missing (invariant violation)
// ============================================

export function requirePosition(world: World, entity: EntityId): PositionComponent {
  return world.getStore(Components.Position).require(entity);
}

export function requireVelocity(world: World, entity: EntityId): VelocityComponent {
  return world.getStore(Components.Velocity).require(entity);
}

export function requireBody(world: World, entity: EntityId): BodyComponent {
  return world.getStore(Components.Body).require(entity);
}

export function requireInput(world: World, entity: EntityId): InputComponent {
  return world.getStore(Components.Input).require(entity);
}

export function requireBlast(world: World, entity: EntityId): BlastComponent {
  return world.getStore(Components.Blast).require(entity);
}

export function requireRenderable(world: World, entity: EntityId): RenderableComponent {
  return world.getStore(Components.Renderable).require(entity);
}
