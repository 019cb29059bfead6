/**
 * Physics world and per-tick update.
 *
 * - update(input) ticks every body, then runs one collision pass
 * - Collision resolution is a single brute-force pass over bodies in
 *   registration order; it is not iterated until bodies settle
 * - render(surface) draws in registration order (later bodies on top)
 */

import { separationVector, type Rect } from "../physics/aabb";
import { BodyTag, type PhysicsBody } from "../physics/body";
import { createDynamicBlock, createPlatform, type Block } from "../physics/block";
import { PlayerController } from "../player/controller";
import { NO_INPUT, type InputSnapshot } from "../ports/input";
import type { Color, RenderSurface } from "../ports/render";
import { IdGenerator } from "./ids";
import { computeSnapshotChecksum, snapshotBody, type WorldSnapshot } from "./hash";

/**
 * Options for world creation
 */
export type WorldOpts = {
  debug?: boolean; // log registrations via console.debug
  ids?: IdGenerator;
};

export class PhysicsWorld {
  private ticks = 0;
  private readonly objects: PhysicsBody[] = [];
  private readonly ids: IdGenerator;
  private readonly debug: boolean;

  constructor(opts: WorldOpts = {}) {
    this.ids = opts.ids ?? new IdGenerator();
    this.debug = opts.debug ?? false;
  }

  /** Number of completed updates */
  get tick(): number {
    return this.ticks;
  }

  get bodies(): readonly PhysicsBody[] {
    return this.objects;
  }

  /**
   * Issue the next body id. Bodies take their identity at construction.
   */
  nextId(): number {
    return this.ids.next();
  }

  register<T extends PhysicsBody>(body: T): T {
    if (this.objects.some((o) => o.id === body.id)) {
      throw new Error(`Body ${body.id} is already registered`);
    }
    this.objects.push(body);
    if (this.debug) {
      console.debug(`[world] registered body ${body.id} at (${body.x}, ${body.y}) ${body.width}x${body.height}`);
    }
    return body;
  }

  spawnPlatform(rect: Rect, color?: Color): Block {
    return this.register(createPlatform(this.nextId(), rect, color));
  }

  spawnBlock(rect: Rect, color?: Color): Block {
    return this.register(createDynamicBlock(this.nextId(), rect, color));
  }

  spawnPlayer(rect: Rect, color?: Color): PlayerController {
    return this.register(new PlayerController(this.nextId(), rect, color));
  }

  find(id: number): PhysicsBody | undefined {
    return this.objects.find((o) => o.id === id);
  }

  /**
   * Advance world by exactly one tick.
   */
  update(input: InputSnapshot = NO_INPUT): void {
    for (const body of this.objects) {
      body.tick(input);
    }

    this.resolveCollisions();
    this.ticks++;
  }

  /**
   * Push each dynamic body out of every other body, in registration order.
   * Only the dynamic body moves, even when the other body is dynamic too.
   * A push may leave it inside a body it was already checked against; that
   * is corrected on a later tick.
   */
  private resolveCollisions(): void {
    const dynamic = this.objects.filter((o) => o.hasTag(BodyTag.DYNAMIC));
    for (const dyn of dynamic) {
      for (const other of this.objects) {
        if (other.id === dyn.id) continue;

        const mtv = separationVector(dyn.bounds(), other.bounds());
        dyn.translate(mtv.x, mtv.y);
      }
    }
  }

  render(surface: RenderSurface): void {
    for (const body of this.objects) {
      body.render(surface);
    }
  }

  snapshot(): WorldSnapshot {
    return { tick: this.tick, bodies: this.objects.map(snapshotBody) };
  }

  checksum(): string {
    return computeSnapshotChecksum(this.snapshot());
  }
}

export function createWorld(opts?: WorldOpts): PhysicsWorld {
  return new PhysicsWorld(opts);
}
