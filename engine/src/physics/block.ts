/**
 * Non-controlled bodies: static platforms and pushable dynamic blocks.
 */

import { boundsOf, type Bounds, type Rect } from "./aabb";
import { BodyTag, type PhysicsBody, type TagSet, hasTag, tagSet, validateRect } from "./body";
import type { InputSnapshot } from "../ports/input";
import { type Color, RED, type RenderSurface } from "../ports/render";

export class Block implements PhysicsBody {
  readonly id: number;
  readonly tags: TagSet;
  x: number;
  y: number;
  readonly width: number;
  readonly height: number;
  color: Color;

  constructor(id: number, rect: Rect, tags: TagSet = tagSet(BodyTag.STATIC), color: Color = RED) {
    validateRect(id, rect);
    this.id = id;
    this.x = rect.x;
    this.y = rect.y;
    this.width = rect.width;
    this.height = rect.height;
    this.tags = tags;
    this.color = color;
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

  tick(_input: InputSnapshot): void {}

  render(surface: RenderSurface): void {
    surface.drawRect(this.x, this.y, this.width, this.height, this.color);
  }
}

export function createPlatform(id: number, rect: Rect, color?: Color): Block {
  return new Block(id, rect, tagSet(BodyTag.STATIC), color);
}

/**
 * A dynamic block is pushed out of other bodies but never moves by itself.
 */
export function createDynamicBlock(id: number, rect: Rect, color?: Color): Block {
  return new Block(id, rect, tagSet(BodyTag.DYNAMIC), color);
}
