/**
 * A single letter tile.
 *
 * Tiles only store state; every rule about where a tile goes lives in Rack.
 * Rack hands tiles out as `TileView`, so drag and animation state can only
 * change through the rack.
 */

import type { AnimationState, Point, Rect } from './types.js';

/** Read-only view of a tile. */
export interface TileView {
  readonly letter: string;
  readonly width: number;
  readonly height: number;
  readonly x: number;
  readonly y: number;
  readonly dragging: boolean;
  readonly grabOffset: Readonly<Point> | null;
  readonly animation: Readonly<AnimationState> | null;
  readonly isAnimating: boolean;
  bounds(): Rect;
  contains(x: number, y: number): boolean;
}

export class Tile implements TileView {
  readonly letter: string;
  readonly width: number;
  readonly height: number;

  private position: Point;
  private drag: Point | null = null;
  private run: AnimationState | null = null;

  constructor(letter: string, x: number, y: number, width: number, height: number) {
    this.letter = letter;
    this.position = { x, y };
    this.width = width;
    this.height = height;
  }

  get x(): number {
    return this.position.x;
  }

  get y(): number {
    return this.position.y;
  }

  get dragging(): boolean {
    return this.drag !== null;
  }

  /** Pointer offset from the tile origin, recorded when a drag starts. */
  get grabOffset(): Readonly<Point> | null {
    return this.drag;
  }

  get animation(): Readonly<AnimationState> | null {
    return this.run;
  }

  get isAnimating(): boolean {
    return this.run !== null;
  }

  /** Mark the tile as dragged; a drag always carries its grab offset. */
  startDrag(grabOffset: Point): void {
    this.drag = { x: grabOffset.x, y: grabOffset.y };
  }

  stopDrag(): void {
    this.drag = null;
  }

  setAnimation(animation: AnimationState | null): void {
    this.run = animation;
  }

  setPosition(x: number, y: number): void {
    this.position = { x, y };
  }

  bounds(): Rect {
    return { x: this.x, y: this.y, width: this.width, height: this.height };
  }

  /** Left and top edges are inside, right and bottom edges are not. */
  contains(x: number, y: number): boolean {
    return (
      x >= this.x &&
      x < this.x + this.width &&
      y >= this.y &&
      y < this.y + this.height
    );
  }
}
