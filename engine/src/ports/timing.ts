/**
 * Timing and lifecycle ports for the frame loop.
 */

export interface FrameClock {
  delay(ms: number): Promise<void>;
}

export interface QuitSignal {
  shouldQuit(): boolean;
}
