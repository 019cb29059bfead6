import { ARENA_HEIGHT, ARENA_WIDTH, type Color, type FrameSurface } from "../../../engine/src";

export interface TextSink {
  write(chunk: string): unknown;
}

export type AsciiRendererOpts = {
  cols?: number;
  rows?: number;
  worldWidth?: number;
  worldHeight?: number;
  glyphs?: Record<string, string>; // keyed by colorKey()
};

const CURSOR_HOME = "\x1b[H";
const BACKGROUND_GLYPH = " ";
const DEFAULT_GLYPH = "#";

export function colorKey(color: Color): string {
  return `${color.r},${color.g},${color.b}`;
}

/**
 * Terminal render surface. World coordinates are scaled onto a grid of
 * character cells; a cell is painted when its center lies inside the rect.
 */
export class AsciiRenderer implements FrameSurface {
  readonly cols: number;
  readonly rows: number;
  private readonly cellWidth: number;
  private readonly cellHeight: number;
  private readonly glyphs: Record<string, string>;
  private cells: string[][];

  constructor(private out: TextSink, opts: AsciiRendererOpts = {}) {
    this.cols = opts.cols ?? 50;
    this.rows = opts.rows ?? 25;
    if (!Number.isInteger(this.cols) || !Number.isInteger(this.rows) || this.cols <= 0 || this.rows <= 0) {
      throw new Error(`Invalid grid size ${this.cols}x${this.rows}`);
    }
    this.cellWidth = (opts.worldWidth ?? ARENA_WIDTH) / this.cols;
    this.cellHeight = (opts.worldHeight ?? ARENA_HEIGHT) / this.rows;
    this.glyphs = opts.glyphs ?? {};
    this.cells = this.blank(BACKGROUND_GLYPH);
  }

  beginFrame(background: Color): void {
    this.cells = this.blank(this.glyphs[colorKey(background)] ?? BACKGROUND_GLYPH);
  }

  drawRect(x: number, y: number, width: number, height: number, color: Color): void {
    const glyph = this.glyphs[colorKey(color)] ?? DEFAULT_GLYPH;

    // cell c covers [c * cellWidth, (c + 1) * cellWidth); test its center
    const c0 = Math.max(0, Math.ceil(x / this.cellWidth - 0.5));
    const c1 = Math.min(this.cols - 1, Math.ceil((x + width) / this.cellWidth - 0.5) - 1);
    const r0 = Math.max(0, Math.ceil(y / this.cellHeight - 0.5));
    const r1 = Math.min(this.rows - 1, Math.ceil((y + height) / this.cellHeight - 0.5) - 1);

    for (let r = r0; r <= r1; r++) {
      const row = this.cells[r];
      if (!row) continue;
      for (let c = c0; c <= c1; c++) {
        row[c] = glyph;
      }
    }
  }

  /** Current frame as text, one line per row */
  frame(): string {
    return this.cells.map((row) => row.join("")).join("\n");
  }

  present(): void {
    this.out.write(`${CURSOR_HOME}${this.frame()}\n`);
  }

  private blank(glyph: string): string[][] {
    return Array.from({ length: this.rows }, () => new Array<string>(this.cols).fill(glyph));
  }
}
