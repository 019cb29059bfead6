/**
 * Input port: a snapshot of the keys held during one frame.
 * Polled once per tick by the frame loop.
 */
export type InputSnapshot = {
  jump: boolean;
  left: boolean;
  right: boolean;
};

export interface InputSource {
  poll(): InputSnapshot;
}

export const NO_INPUT: Readonly<InputSnapshot> = Object.freeze({ jump: false, left: false, right: false });
