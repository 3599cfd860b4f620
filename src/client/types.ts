/**
 * Client-side rendering types for the tile rack board.
 */

import type { Rect } from '../types.js';

/** Canvas composite operation applied while a drawable paints itself. */
export type BlendMode = GlobalCompositeOperation;

/**
 * The members of a Canvas 2D context the renderer uses.
 * A real `CanvasRenderingContext2D` satisfies it.
 */
export interface RenderContext {
  fillStyle: string | CanvasGradient | CanvasPattern;
  font: string;
  textAlign: CanvasTextAlign;
  textBaseline: CanvasTextBaseline;
  globalCompositeOperation: GlobalCompositeOperation;
  save(): void;
  restore(): void;
  setTransform(a: number, b: number, c: number, d: number, e: number, f: number): void;
  clearRect(x: number, y: number, width: number, height: number): void;
  fillRect(x: number, y: number, width: number, height: number): void;
  fillText(text: string, x: number, y: number): void;
}

/** Anything that can paint itself onto a render context. */
export interface Drawable {
  draw(ctx: RenderContext): void;
  bounds(): Rect;
  /** Null draws with whatever mode the context already has. */
  readonly blendMode: BlendMode | null;
  setBlendMode(mode: BlendMode | null): void;
}

/** Screen placement of the rack. */
export interface ViewState {
  /** Offset in screen pixels. */
  offsetX: number;
  offsetY: number;
  /** Scale factor (1.0 = one rack unit per CSS pixel). */
  zoom: number;
}

export interface RenderStyle {
  background: string;
  tileColor: string;
  /** Fill of the tile under the pointer. */
  draggingTileColor: string;
  letterColor: string;
  fontFamily: string;
  fontSize: number;
}

export const DEFAULT_RENDER_STYLE: RenderStyle = {
  background: '#ffffff',
  tileColor: '#e6e6e6',
  draggingTileColor: '#f2f2f2',
  letterColor: '#000000',
  fontFamily: 'system-ui, sans-serif',
  fontSize: 24,
};
