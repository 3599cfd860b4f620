/**
 * View transform for the rack board.
 *
 * Converts between rack coordinates and screen coordinates (canvas CSS
 * pixels). The rack is centered in the canvas and scaled down, never up,
 * when the canvas is too narrow to show it whole.
 */

import type { Point, Rect } from '../types.js';
import type { ViewState } from './types.js';

export const MIN_ZOOM = 0.1;
export const MAX_ZOOM = 1.0;

export function createView(): ViewState {
  return { offsetX: 0, offsetY: 0, zoom: 1.0 };
}

/**
 * Center the rack bounds within the given canvas dimensions.
 */
export function fitToRack(
  bounds: Rect,
  canvasWidth: number,
  canvasHeight: number,
  padding: number = 40,
): ViewState {
  const scaleX = (canvasWidth - 2 * padding) / bounds.width;
  const scaleY = (canvasHeight - 2 * padding) / bounds.height;
  const zoom = clampZoom(Math.min(scaleX, scaleY));

  const centerX = bounds.x + bounds.width / 2;
  const centerY = bounds.y + bounds.height / 2;

  return {
    offsetX: canvasWidth / 2 - centerX * zoom,
    offsetY: canvasHeight / 2 - centerY * zoom,
    zoom,
  };
}

export function rackToScreen(view: ViewState, point: Point): Point {
  return {
    x: point.x * view.zoom + view.offsetX,
    y: point.y * view.zoom + view.offsetY,
  };
}

export function screenToRack(view: ViewState, screen: Point): Point {
  return {
    x: (screen.x - view.offsetX) / view.zoom,
    y: (screen.y - view.offsetY) / view.zoom,
  };
}

function clampZoom(zoom: number): number {
  if (!Number.isFinite(zoom)) return MAX_ZOOM;
  return Math.max(MIN_ZOOM, Math.min(MAX_ZOOM, zoom));
}
