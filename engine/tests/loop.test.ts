import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { runLoop, runFrame, DEFAULT_FRAME_DELAY_MS } from "../src/sim/loop";
import { createWorld } from "../src/sim/tick";
import { BLACK, RED, type FrameSurface } from "../src/ports/render";
import type { InputSnapshot } from "../src/ports/input";

function fakeSurface(events: string[]): FrameSurface {
  return {
    beginFrame: vi.fn(() => events.push("begin")),
    drawRect: vi.fn(() => events.push("draw")),
    present: vi.fn(() => events.push("present")),
  };
}

describe("frame loop", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs input, update, render, present and delay in order until quit", async () => {
    const events: string[] = [];
    const world = createWorld();
    world.spawnPlatform({ x: 0, y: 0, width: 1, height: 1 });
    const update = vi.spyOn(world, "update");
    let frames = 0;
    const idle: InputSnapshot = { jump: false, left: false, right: false };

    const ran = await runLoop({
      world,
      input: {
        poll: () => {
          events.push("poll");
          return idle;
        },
      },
      surface: fakeSurface(events),
      clock: {
        delay: async () => {
          events.push("delay");
        },
      },
      quit: { shouldQuit: () => frames++ >= 2 },
    });

    expect(ran).toBe(2);
    expect(update).toHaveBeenCalledTimes(2);
    expect(update).toHaveBeenCalledWith(idle);
    expect(events).toEqual([
      "poll", "begin", "draw", "present", "delay",
      "poll", "begin", "draw", "present", "delay",
    ]);
  });

  it("checks quit before the first frame", async () => {
    const poll = vi.fn();
    const ran = await runLoop({
      world: createWorld(),
      input: { poll },
      surface: fakeSurface([]),
      clock: { delay: vi.fn(async () => {}) },
      quit: { shouldQuit: () => true },
    });
    expect(ran).toBe(0);
    expect(poll).not.toHaveBeenCalled();
  });

  it("uses the default delay and stops at maxFrames", async () => {
    const delay = vi.fn(async () => {});
    const ran = await runLoop({
      world: createWorld(),
      input: { poll: () => ({ jump: false, left: false, right: false }) },
      surface: fakeSurface([]),
      clock: { delay },
      quit: { shouldQuit: () => false },
      maxFrames: 3,
    });
    expect(ran).toBe(3);
    expect(delay).toHaveBeenCalledTimes(3);
    expect(delay).toHaveBeenCalledWith(DEFAULT_FRAME_DELAY_MS);
  });

  it("rejects a negative frame delay", async () => {
    await expect(
      runLoop({
        world: createWorld(),
        input: { poll: vi.fn() },
        surface: fakeSurface([]),
        clock: { delay: vi.fn(async () => {}) },
        quit: { shouldQuit: () => false },
        frameDelayMs: -1,
      }),
    ).rejects.toThrow("Invalid frame delay: -1");
  });

  it("propagates port failures", async () => {
    await expect(
      runLoop({
        world: createWorld(),
        input: { poll: () => ({ jump: false, left: false, right: false }) },
        surface: fakeSurface([]),
        clock: { delay: async () => Promise.reject(new Error("clock stopped")) },
        quit: { shouldQuit: () => false },
      }),
    ).rejects.toThrow("clock stopped");
  });

  it("clears with the background and draws bodies in one frame", () => {
    const surface = fakeSurface([]);
    const world = createWorld();
    world.spawnPlatform({ x: 1, y: 2, width: 3, height: 4 });

    runFrame({ world, input: { poll: () => ({ jump: false, left: false, right: false }) }, surface });

    expect(surface.beginFrame).toHaveBeenCalledWith(BLACK);
    expect(surface.drawRect).toHaveBeenCalledWith(1, 2, 3, 4, RED);
    expect(surface.present).toHaveBeenCalledTimes(1);
    expect(world.tick).toBe(1);
  });
});
