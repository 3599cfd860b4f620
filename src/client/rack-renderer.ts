/**
 * Rack renderer: Drawable implementations for tiles and the rack.
 *
 * A tile is a filled rectangle with its letter centered on it. The rack
 * draws its tiles in draw order so the dragged tile ends up on top.
 */

import type { Rect } from '../types.js';
import type { TileView } from '../tile.js';
import type { Rack } from '../rack.js';
import type { BlendMode, Drawable, RenderContext, RenderStyle } from './types.js';
import { DEFAULT_RENDER_STYLE } from './types.js';

export function createTileDrawable(
  tile: TileView,
  style: RenderStyle = DEFAULT_RENDER_STYLE,
): Drawable {
  let blendMode: BlendMode | null = null;

  return {
    draw(ctx: RenderContext) {
      ctx.save();
      if (blendMode) ctx.globalCompositeOperation = blendMode;

      ctx.fillStyle = tile.dragging ? style.draggingTileColor : style.tileColor;
      ctx.fillRect(tile.x, tile.y, tile.width, tile.height);

      ctx.fillStyle = style.letterColor;
      ctx.font = `${style.fontSize}px ${style.fontFamily}`;
      ctx.textAlign = 'center';
      ctx.textBaseline = 'middle';
      ctx.fillText(tile.letter, tile.x + tile.width / 2, tile.y + tile.height / 2);

      ctx.restore();
    },
    bounds(): Rect {
      return tile.bounds();
    },
    get blendMode() {
      return blendMode;
    },
    setBlendMode(mode: BlendMode | null) {
      blendMode = mode;
    },
  };
}

export function createRackDrawable(
  rack: Rack,
  style: RenderStyle = DEFAULT_RENDER_STYLE,
): Drawable {
  let blendMode: BlendMode | null = null;

  return {
    draw(ctx: RenderContext) {
      ctx.save();
      if (blendMode) ctx.globalCompositeOperation = blendMode;
      for (const tile of rack.drawOrder()) {
        createTileDrawable(tile, style).draw(ctx);
      }
      ctx.restore();
    },
    bounds(): Rect {
      return rack.bounds();
    },
    get blendMode() {
      return blendMode;
    },
    setBlendMode(mode: BlendMode | null) {
      blendMode = mode;
    },
  };
}
