/**
 * AABB helpers (deterministic, no side-effects).
 *
 * Bounds are closed intervals on each axis, so boxes that only touch along
 * an edge are reported as colliding.
 */

export type Interval = { min: number; max: number };

export type Bounds = { x: Interval; y: Interval };

export type Vec2 = { x: number; y: number };

export type Rect = { x: number; y: number; width: number; height: number };

export function interval(min: number, max: number): Interval {
  return { min, max };
}

/**
 * Bounds of a top-left anchored rectangle
 */
export function boundsOf(rect: Rect): Bounds {
  return {
    x: interval(rect.x, rect.x + rect.width),
    y: interval(rect.y, rect.y + rect.height),
  };
}

function collides1d(a: Interval, b: Interval): boolean {
  return a.min <= b.max && b.min <= a.max;
}

/**
 * Push that moves `a` to whichever side of `b` is closer.
 */
function push1d(a: Interval, b: Interval): number {
  return Math.abs(a.max - b.min) < Math.abs(b.max - a.min) ? b.min - a.max : b.max - a.min;
}

/**
 * Test collision between two boxes (edges included)
 */
export function isColliding(a: Bounds, b: Bounds): boolean {
  return collides1d(a.x, b.x) && collides1d(a.y, b.y);
}

/**
 * Test for overlap with positive area; touching edges do not count.
 */
export function isOverlapping(a: Bounds, b: Bounds): boolean {
  return a.x.min < b.x.max && b.x.min < a.x.max && a.y.min < b.y.max && b.y.min < a.y.max;
}

/**
 * Compute the translation that moves `a` out of `b`.
 * Returns {x, y} where at most one component is non-zero: the axis with the
 * smaller push wins, and a tie resolves along y.
 *
 * Purely positional (no velocity changes).
 */
export function separationVector(a: Bounds, b: Bounds): Vec2 {
  if (!isColliding(a, b)) return { x: 0, y: 0 };

  const x = push1d(a.x, b.x);
  const y = push1d(a.y, b.y);

  if (Math.abs(x) < Math.abs(y)) return { x, y: 0 };
  return { x: 0, y };
}
