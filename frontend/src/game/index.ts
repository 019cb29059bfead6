/**
 * Terminal demo: the default arena driven by the keyboard.
 * Space/up jumps, left/right move, q or Ctrl-C quits.
 */

import { setTimeout as sleep } from "node:timers/promises";
import { ARENA_TITLE, createArena, createWorld, runLoop, type FrameClock } from "../../../engine/src";
import { KeyboardInput } from "../input/keyboard";
import { AsciiRenderer } from "./renderer";

const CLEAR_SCREEN = "\x1b[2J";
const setTitle = (title: string) => `\x1b]0;${title}\x07`;
const HIDE_CURSOR = "\x1b[?25l";
const SHOW_CURSOR = "\x1b[?25h";

const clock: FrameClock = {
  delay: async (ms) => {
    await sleep(ms);
  },
};

export async function main(): Promise<void> {
  const world = createWorld();
  createArena(world);

  const keyboard = new KeyboardInput();
  const renderer = new AsciiRenderer(process.stdout);

  process.stdout.write(`${setTitle(ARENA_TITLE)}${CLEAR_SCREEN}${HIDE_CURSOR}`);
  const detach = keyboard.attach(process.stdin);
  try {
    await runLoop({ world, input: keyboard, surface: renderer, clock, quit: keyboard });
  } finally {
    detach();
    process.stdout.write(SHOW_CURSOR);
  }
}

main().catch((err: unknown) => {
  console.error("[demo] fatal error", err);
  process.exitCode = 1;
});
