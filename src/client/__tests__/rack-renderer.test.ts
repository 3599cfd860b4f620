import { describe, it, expect } from 'vitest';
import { createTileDrawable, createRackDrawable } from '../rack-renderer.js';
import { DEFAULT_RENDER_STYLE } from '../types.js';
import type { RenderStyle } from '../types.js';
import { Tile } from '../../tile.js';
import { Rack } from '../../rack.js';
import { RecordingContext } from './recording-context.js';

describe('createTileDrawable', () => {
  it('draws a filled rectangle at the tile position', () => {
    const ctx = new RecordingContext();
    createTileDrawable(new Tile('E', 60, 0, 50, 50)).draw(ctx);

    const [rect] = ctx.callsOf('fillRect');
    expect(rect.args).toEqual([60, 0, 50, 50]);
    expect(rect.fillStyle).toBe('#e6e6e6');
  });

  it('centers the letter on the tile', () => {
    const ctx = new RecordingContext();
    createTileDrawable(new Tile('E', 60, 0, 50, 50)).draw(ctx);

    const [text] = ctx.callsOf('fillText');
    expect(text.args).toEqual(['E', 85, 25]);
    expect(text.fillStyle).toBe('#000000');
  });

  it('restores context state after drawing', () => {
    const ctx = new RecordingContext();
    createTileDrawable(new Tile('E', 0, 0, 50, 50)).draw(ctx);
    expect(ctx.font).toBe('10px sans-serif');
    expect(ctx.textAlign).toBe('start');
  });

  it('uses the configured style', () => {
    const style: RenderStyle = { ...DEFAULT_RENDER_STYLE, tileColor: '#ffcc00', fontSize: 30, fontFamily: 'serif' };
    const ctx = new RecordingContext();
    createTileDrawable(new Tile('Q', 0, 0, 50, 50), style).draw(ctx);
    expect(ctx.callsOf('fillRect')[0].fillStyle).toBe('#ffcc00');
    expect(ctx.callsOf('fillText')[0].font).toBe('30px serif');
  });

  it('highlights a dragged tile', () => {
    const rack = new Rack('AE');
    rack.beginDrag(1, 70, 10);
    const ctx = new RecordingContext();
    createTileDrawable(rack.tiles[1]).draw(ctx);
    expect(ctx.callsOf('fillRect')[0].fillStyle).toBe(DEFAULT_RENDER_STYLE.draggingTileColor);
  });

  it('reports the tile bounds', () => {
    const tile = new Tile('E', 60, 5, 50, 50);
    expect(createTileDrawable(tile).bounds()).toEqual({ x: 60, y: 5, width: 50, height: 50 });
  });

  it('applies its blend mode while drawing', () => {
    const drawable = createTileDrawable(new Tile('E', 0, 0, 50, 50));
    expect(drawable.blendMode).toBeNull();

    drawable.setBlendMode('multiply');
    expect(drawable.blendMode).toBe('multiply');

    const ctx = new RecordingContext();
    drawable.draw(ctx);
    expect(ctx.callsOf('fillRect')[0].composite).toBe('multiply');
    expect(ctx.globalCompositeOperation).toBe('source-over');
  });
});

describe('createRackDrawable', () => {
  it('draws tiles in slot order at rest', () => {
    const ctx = new RecordingContext();
    createRackDrawable(new Rack('AEINRST')).draw(ctx);
    expect(ctx.texts()).toEqual(['A', 'E', 'I', 'N', 'R', 'S', 'T']);
  });

  it('draws the dragged tile last', () => {
    const rack = new Rack('AEINRST');
    rack.beginDrag(1, 70, 10);
    const ctx = new RecordingContext();
    createRackDrawable(rack).draw(ctx);
    expect(ctx.texts()).toEqual(['A', 'I', 'N', 'R', 'S', 'T', 'E']);
  });

  it('reports the rack bounds', () => {
    const rack = new Rack('AEINRST', { x: 100, y: 200 });
    expect(createRackDrawable(rack).bounds()).toEqual({ x: 100, y: 200, width: 410, height: 50 });
  });

  it('passes its blend mode on to the tiles', () => {
    const drawable = createRackDrawable(new Rack('AB'));
    drawable.setBlendMode('lighter');
    const ctx = new RecordingContext();
    drawable.draw(ctx);
    expect(ctx.callsOf('fillRect').map(c => c.composite)).toEqual(['lighter', 'lighter']);
    expect(ctx.globalCompositeOperation).toBe('source-over');
  });
});
