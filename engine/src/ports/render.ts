/**
 * Render port. The engine only ever asks for filled rectangles; the surface
 * accumulates them and the frame loop presents once per frame.
 */

export type Color = { r: number; g: number; b: number };

export const RED: Color = { r: 255, g: 0, b: 0 };
export const BLACK: Color = { r: 0, g: 0, b: 0 };

export interface RenderSurface {
  drawRect(x: number, y: number, width: number, height: number, color: Color): void;
}

export interface FrameSurface extends RenderSurface {
  beginFrame(background: Color): void;
  present(): void;
}
