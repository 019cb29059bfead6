import { describe, it, expect } from "vitest";
import { createArena, PLAYER_SPAWN } from "../src/level/arena";
import { createWorld } from "../src/sim/tick";
import { computeSnapshotChecksum } from "../src/sim/hash";
import { NO_INPUT, type InputSnapshot } from "../src/ports/input";

describe("default arena", () => {
  it("registers the player first, then the edges and the middle platform", () => {
    const world = createWorld();
    const { player, platforms } = createArena(world);

    expect(world.bodies[0]).toBe(player);
    expect(platforms.map((p) => p.id)).toEqual([1, 2, 3, 4, 5]);
    expect(world.snapshot().bodies[0]).toEqual({
      id: 0,
      ...PLAYER_SPAWN,
      tags: ["DYNAMIC", "PLAYER_CONTROLLED"],
      velocity: { x: 0, y: 0 },
    });
    expect(world.snapshot().bodies[5]).toEqual({ id: 5, x: 180, y: 225, width: 140, height: 50, tags: ["STATIC"] });
  });

  it("lets the player fall onto the floor and stay there", () => {
    const world = createWorld();
    const { player } = createArena(world);

    for (let i = 0; i < 6; i++) world.update(NO_INPUT);
    expect(player.y).toBe(430);

    for (let i = 0; i < 24; i++) world.update(NO_INPUT);
    expect(player.y).toBe(430);
    expect(player.x).toBe(50);
  });
});

describe("world determinism", () => {
  function run(inputs: InputSnapshot[]) {
    const world = createWorld();
    createArena(world);
    const checksums: string[] = [];
    for (const input of inputs) {
      world.update(input);
      checksums.push(world.checksum());
    }
    return { world, checksums };
  }

  const inputs: InputSnapshot[] = Array.from({ length: 40 }, (_, i) => ({
    jump: i % 12 === 3,
    left: i > 25,
    right: i < 15,
  }));

  it("produces identical checksums for identical inputs", () => {
    const run1 = run(inputs);
    const run2 = run(inputs);
    expect(run1.checksums).toEqual(run2.checksums);
    expect(run1.world.tick).toBe(40);
    expect(computeSnapshotChecksum(run1.world.snapshot())).toBe(run1.world.checksum());
  });

  it("produces different checksums for different inputs", () => {
    const idle = run(Array.from({ length: 5 }, () => NO_INPUT));
    const moving = run(Array.from({ length: 5 }, () => ({ jump: false, left: false, right: true })));
    expect(idle.world.checksum()).not.toBe(moving.world.checksum());
  });
});
