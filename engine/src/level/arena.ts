/**
 * Default arena: a 500x500 box with one platform in the middle.
 */

import type { Block } from "../physics/block";
import type { PlayerController } from "../player/controller";
import type { PhysicsWorld } from "../sim/tick";

export const ARENA_WIDTH = 500;
export const ARENA_HEIGHT = 500;
export const ARENA_TITLE = "Platform Master";

export const PLAYER_SPAWN = { x: 50, y: 380, width: 40, height: 60 };

const EDGES = [
  { x: 5, y: 490, width: 490, height: 5 }, // floor
  { x: 5, y: 5, width: 490, height: 5 }, // ceiling
  { x: 5, y: 10, width: 5, height: 480 }, // left wall
  { x: 490, y: 10, width: 5, height: 480 }, // right wall
];

const MIDDLE_PLATFORM = { x: 180, y: 225, width: 140, height: 50 };

export type Arena = {
  player: PlayerController;
  platforms: Block[];
};

/**
 * Register the arena bodies. The player goes first so it resolves and draws
 * before the platforms.
 */
export function createArena(world: PhysicsWorld): Arena {
  const player = world.spawnPlayer(PLAYER_SPAWN);
  const platforms = [...EDGES, MIDDLE_PLATFORM].map((rect) => world.spawnPlatform(rect));
  return { player, platforms };
}
