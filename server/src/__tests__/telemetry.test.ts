// ============================================
// Telemetry Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { createWorld, createMonster, createPlayer, headlessSprites } from '../ecs';
import { createWorldSnapshot } from '../telemetry';

describe('createWorldSnapshot', () => {
  it('lists positioned entities by role and counts store entries', () => {
    const world = createWorld();
    const player = createPlayer(world, headlessSprites);
    const monster = createMonster(world, { x: 12, y: -3 }, headlessSprites);

    const snapshot = createWorldSnapshot(world);

    expect(snapshot.entities).toEqual([
      { entity: player, role: 'player', position: { x: 0, y: 0 } },
      { entity: monster, role: 'monster', position: { x: 12, y: -3 } },
    ]);
    expect(snapshot.components).toEqual({
      Position: 2,
      Velocity: 2,
      Body: 2,
      Input: 1,
      Blast: 0,
      Renderable: 2,
    });
  });
});
