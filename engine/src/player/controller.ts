/**
 * Player-controlled body.
 * Integrates input into velocity and velocity into position once per tick.
 * Velocity uses "up is positive" while screen y grows downward.
 */

import { boundsOf, type Bounds, type Rect, type Vec2 } from "../physics/aabb";
import { BodyTag, type PhysicsBody, type TagSet, hasTag, tagSet, validateRect } from "../physics/body";
import type { InputSnapshot } from "../ports/input";
import { type Color, RED, type RenderSurface } from "../ports/render";

// Movement constants (per tick, no delta time)
export const JUMP_IMPULSE = 30.0;
export const JUMP_THRESHOLD = 0.1; // jump only while vy is below this
export const WALK_ACCEL = 3;
export const MAX_WALK_SPEED = 10;
export const GRAVITY_STEP = 3;
export const MAX_FALL_SPEED = 15;

export class PlayerController implements PhysicsBody {
  readonly id: number;
  readonly tags: TagSet = tagSet(BodyTag.DYNAMIC, BodyTag.PLAYER_CONTROLLED);
  x: number;
  y: number;
  readonly width: number;
  readonly height: number;
  color: Color;
  private vx = 0;
  private vy = 0;

  constructor(id: number, rect: Rect, color: Color = RED) {
    validateRect(id, rect);
    this.id = id;
    this.x = rect.x;
    this.y = rect.y;
    this.width = rect.width;
    this.height = rect.height;
    this.color = color;
  }

  get velocity(): Readonly<Vec2> {
    return { x: this.vx, y: this.vy };
  }

  bounds(): Bounds {
    return boundsOf(this);
  }

  translate(dx: number, dy: number): void {
    this.x += dx;
    this.y += dy;
  }

  hasTag(tag: BodyTag): boolean {
    return hasTag(this.tags, tag);
  }

  tick(input: InputSnapshot): void {
    // Holding jump re-fires the impulse whenever vy drops back under the threshold
    if (input.jump && this.vy < JUMP_THRESHOLD) {
      if (this.vy < 0) this.vy = 0;
      this.vy += JUMP_IMPULSE;
    }
    if (input.left && this.vx > -MAX_WALK_SPEED) {
      this.vx -= WALK_ACCEL;
    }
    if (input.right && this.vx < MAX_WALK_SPEED) {
      this.vx += WALK_ACCEL;
    }

    // Constant step until the fall speed floor is reached
    if (this.vy > -MAX_FALL_SPEED) {
      this.vy -= GRAVITY_STEP;
    }

    this.x += this.vx;
    this.y -= this.vy;
  }

  render(surface: RenderSurface): void {
    surface.drawRect(this.x, this.y, this.width, this.height, this.color);
  }
}
