/**
 * Cooperative frame loop.
 *
 * Each frame: quit check -> input snapshot -> world update -> render -> present -> delay.
 * The simulation uses fixed per-tick constants, so the step is tied to the
 * frame delay rather than to measured elapsed time.
 */

import type { InputSource } from "../ports/input";
import { BLACK, type Color, type FrameSurface } from "../ports/render";
import type { FrameClock, QuitSignal } from "../ports/timing";
import type { PhysicsWorld } from "./tick";

export const DEFAULT_FRAME_DELAY_MS = 40;

export type LoopOpts = {
  frameDelayMs?: number;
  maxFrames?: number; // stop after this many frames even without a quit signal
  background?: Color;
};

export type LoopContext = LoopOpts & {
  world: PhysicsWorld;
  input: InputSource;
  surface: FrameSurface;
  clock: FrameClock;
  quit: QuitSignal;
};

/**
 * Run frames until the quit signal fires. Resolves with the number of frames run.
 */
export async function runLoop(ctx: LoopContext): Promise<number> {
  const frameDelayMs = ctx.frameDelayMs ?? DEFAULT_FRAME_DELAY_MS;
  const background = ctx.background ?? BLACK;
  const maxFrames = ctx.maxFrames ?? Infinity;

  if (!Number.isFinite(frameDelayMs) || frameDelayMs < 0) {
    throw new Error(`Invalid frame delay: ${frameDelayMs}`);
  }

  console.info(`[loop] starting with ${ctx.world.bodies.length} bodies, ${frameDelayMs}ms per frame`);

  let frames = 0;
  while (frames < maxFrames && !ctx.quit.shouldQuit()) {
    runFrame(ctx, background);
    frames++;
    await ctx.clock.delay(frameDelayMs);
  }

  console.info(`[loop] stopped after ${frames} frames`);
  return frames;
}

/**
 * One synchronous frame, without the trailing delay.
 */
export function runFrame(ctx: Pick<LoopContext, "world" | "input" | "surface">, background: Color = BLACK): void {
  const snapshot = ctx.input.poll();
  ctx.world.update(snapshot);

  ctx.surface.beginFrame(background);
  ctx.world.render(ctx.surface);
  ctx.surface.present();
}
