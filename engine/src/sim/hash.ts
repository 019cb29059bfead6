/**
 * Deterministic world hashing utilities.
 * Used to verify that identical input sequences produce identical worlds.
 */

import type { Vec2 } from "../physics/aabb";
import { tagNames, type PhysicsBody } from "../physics/body";

export type BodySnapshot = {
  id: number;
  x: number;
  y: number;
  width: number;
  height: number;
  tags: string[];
  velocity?: Vec2;
};

export type WorldSnapshot = {
  tick: number;
  bodies: BodySnapshot[];
};

/**
 * Simple deterministic hash function (FNV-1a variant)
 */
export function fnv1aHash(str: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash += (hash << 1) + (hash << 4) + (hash << 7) + (hash << 8) + (hash << 24);
  }
  return hash >>> 0; // Convert to unsigned 32-bit integer
}

/**
 * Quantize float values for stable hashing
 */
export function quantizeValue(value: number, precision: number = 1000): number {
  return Math.round(value * precision);
}

export function snapshotBody(body: PhysicsBody): BodySnapshot {
  const snap: BodySnapshot = {
    id: body.id,
    x: body.x,
    y: body.y,
    width: body.width,
    height: body.height,
    tags: tagNames(body.tags),
  };
  if (body.velocity) snap.velocity = { x: body.velocity.x, y: body.velocity.y };
  return snap;
}

/**
 * Compute checksum for a world snapshot.
 * Body order is registration order and is part of the hash.
 */
export function computeSnapshotChecksum(snapshot: WorldSnapshot): string {
  const canonical = snapshot.bodies
    .map((b) => {
      const fields = [b.id, quantizeValue(b.x), quantizeValue(b.y), quantizeValue(b.width), quantizeValue(b.height), b.tags.join("|")];
      if (b.velocity) fields.push(quantizeValue(b.velocity.x), quantizeValue(b.velocity.y));
      return fields.join(",");
    })
    .join(";");

  return fnv1aHash(`${snapshot.tick}#${canonical}`).toString(16);
}
