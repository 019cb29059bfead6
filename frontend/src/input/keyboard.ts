import { emitKeypressEvents, type Key } from "node:readline";
import type { InputSnapshot, InputSource, QuitSignal } from "../../../engine/src";

export type KeyboardInputOpts = {
  holdMs?: number;
  now?: () => number;
};

type Action = keyof InputSnapshot;

export type KeypressStream = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

const KEY_ACTIONS: Record<string, Action> = {
  space: "jump",
  up: "jump",
  left: "left",
  right: "right",
};

/**
 * Keyboard input from terminal keypress events.
 *
 * Terminals send repeated keypresses while a key is held and never report a
 * release, so a key counts as held until holdMs after its latest event.
 */
export class KeyboardInput implements InputSource, QuitSignal {
  private readonly holdMs: number;
  private readonly now: () => number;
  private readonly lastSeen = new Map<Action, number>();
  private quitRequested = false;

  constructor(opts: KeyboardInputOpts = {}) {
    this.holdMs = opts.holdMs ?? 150;
    this.now = opts.now ?? Date.now;
  }

  handleKey(key: Key): void {
    if ((key.ctrl && key.name === "c") || key.name === "q" || key.name === "escape") {
      this.quitRequested = true;
      return;
    }
    const action = key.name === undefined ? undefined : KEY_ACTIONS[key.name];
    if (action) this.lastSeen.set(action, this.now());
  }

  poll(): InputSnapshot {
    const t = this.now();
    return {
      jump: this.isHeld("jump", t),
      left: this.isHeld("left", t),
      right: this.isHeld("right", t),
    };
  }

  shouldQuit(): boolean {
    return this.quitRequested;
  }

  /**
   * Listen to a TTY stream in raw mode. Returns a function that restores it.
   */
  attach(stdin: KeypressStream): () => void {
    emitKeypressEvents(stdin);
    if (stdin.isTTY) stdin.setRawMode?.(true);

    const onKeypress = (_str: string | undefined, key: Key | undefined) => {
      if (key) this.handleKey(key);
    };
    stdin.on("keypress", onKeypress);
    stdin.resume();

    return () => {
      stdin.off("keypress", onKeypress);
      if (stdin.isTTY) stdin.setRawMode?.(false);
      stdin.pause();
    };
  }

  private isHeld(action: Action, t: number): boolean {
    const seen = this.lastSeen.get(action);
    return seen !== undefined && t - seen <= this.holdMs;
  }
}
