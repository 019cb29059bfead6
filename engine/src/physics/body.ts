/**
 * Physics body contract shared by every body variant, plus the tag bitset.
 */

import type { Bounds, Rect, Vec2 } from "./aabb";
import type { InputSnapshot } from "../ports/input";
import type { RenderSurface } from "../ports/render";

export const BodyTag = {
  STATIC: 1 << 0,
  DYNAMIC: 1 << 1,
  PLAYER_CONTROLLED: 1 << 2,
} as const;

export type BodyTag = (typeof BodyTag)[keyof typeof BodyTag];

/** Bitwise OR of BodyTag values */
export type TagSet = number;

export function tagSet(...tags: BodyTag[]): TagSet {
  let set = 0;
  for (const tag of tags) set |= tag;
  return set;
}

export function hasTag(set: TagSet, tag: BodyTag): boolean {
  return (set & tag) !== 0;
}

export function tagNames(set: TagSet): string[] {
  return Object.entries(BodyTag)
    .filter(([, tag]) => hasTag(set, tag))
    .map(([name]) => name);
}

export interface PhysicsBody {
  readonly id: number;
  readonly tags: TagSet;
  x: number;
  y: number;
  readonly width: number;
  readonly height: number;
  /** Present on bodies that integrate their own velocity */
  readonly velocity?: Readonly<Vec2>;

  bounds(): Bounds;
  translate(dx: number, dy: number): void;
  hasTag(tag: BodyTag): boolean;
  /** Advance one tick. Non-controlled bodies ignore it. */
  tick(input: InputSnapshot): void;
  render(surface: RenderSurface): void;
}

/**
 * Reject rectangles a body cannot be built from.
 */
export function validateRect(id: number, rect: Rect): void {
  if (!Number.isInteger(id) || id < 0) {
    throw new Error(`Invalid body id: ${id}`);
  }
  if (!Number.isFinite(rect.x) || !Number.isFinite(rect.y)) {
    throw new Error(`Body ${id} has a non-finite position (${rect.x}, ${rect.y})`);
  }
  if (!Number.isFinite(rect.width) || !Number.isFinite(rect.height) || rect.width <= 0 || rect.height <= 0) {
    throw new Error(`Body ${id} must have positive extents, got ${rect.width}x${rect.height}`);
  }
}
