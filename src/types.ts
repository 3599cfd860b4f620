/**
 * Core type definitions for the tile rack engine.
 */

// -- Geometry --

/** 2D point in rack coordinates. */
export interface Point {
  x: number;
  y: number;
}

/** Axis-aligned rectangle, anchored at its top-left corner. */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// -- Animation --

/** Linear interpolation run for a single tile. */
export interface AnimationState {
  /** Steps taken so far in this run. */
  step: number;
  /** Increment applied on every step; fixed for the whole run. */
  stepVector: Point;
}

// -- Configuration --

/** Layout and timing shared by every tile in a rack. */
export interface RackConfig {
  tileWidth: number;
  tileHeight: number;
  /** Gap between adjacent tiles. */
  spacing: number;
  /** Ticks an animation run takes. 0 disables interpolation. */
  animationSteps: number;
}

export const DEFAULT_RACK_CONFIG: RackConfig = {
  tileWidth: 50,
  tileHeight: 50,
  spacing: 10,
  animationSteps: 100,
};

/** Letters shown when no rack is requested. */
export const DEFAULT_LETTERS = 'AEINRST';

// -- Drag results --

export type BeginDragResult =
  | { ok: true; index: number }
  | { ok: false; reason: string };

/** A committed reorder: the tile left slot `from` and now sits in slot `to`. */
export interface RackMove {
  from: number;
  to: number;
  letter: string;
}
