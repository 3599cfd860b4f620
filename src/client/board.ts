/**
 * Rack Board: owns the canvas, pointer input and the tick/render loop.
 *
 * Each animation frame runs the rack's fixed-rate ticks owed since the
 * previous frame, then redraws. The loop stops while the rack is at rest and
 * restarts on input or resize.
 */

import type { Point, RackConfig, RackMove } from '../types.js';
import { DEFAULT_RACK_CONFIG } from '../types.js';
import { Rack } from '../rack.js';
import { InputController } from '../input-controller.js';
import type { RenderContext, RenderStyle, ViewState } from './types.js';
import { DEFAULT_RENDER_STYLE } from './types.js';
import { createView, fitToRack, screenToRack } from './view.js';
import { DEFAULT_TICK_RATE_HZ, FixedStepClock } from './fixed-step.js';
import { createRackDrawable } from './rack-renderer.js';

export interface RackBoardOptions {
  config?: RackConfig;
  style?: RenderStyle;
  tickRateHz?: number;
  /** Called after every drop with the move and the new letter order. */
  onReorder?: (move: RackMove, letters: string) => void;
  /** Draw here instead of the canvas's own 2D context. */
  context?: RenderContext;
}

export interface RackBoard {
  getRack(): Rack;
  getCanvas(): HTMLCanvasElement;
  /** Resize the canvas and re-center the rack. */
  resize(width: number, height: number): void;
  /** Stop the loop, detach listeners and remove the canvas. */
  destroy(): void;
}

/**
 * Create a rack board attached to a container element.
 * Throws if the letters or config are invalid, or no 2D context exists.
 */
export function createRackBoard(
  container: HTMLElement,
  letters: string,
  options: RackBoardOptions = {},
): RackBoard {
  const config = options.config ?? DEFAULT_RACK_CONFIG;
  const style = options.style ?? DEFAULT_RENDER_STYLE;

  const rack = new Rack(letters, { x: 0, y: 0 }, config);
  const input = new InputController(rack, { onReorder: options.onReorder });
  const clock = new FixedStepClock(options.tickRateHz ?? DEFAULT_TICK_RATE_HZ);
  const rackDrawable = createRackDrawable(rack, style);

  const canvas = document.createElement('canvas');
  canvas.style.display = 'block';
  canvas.style.width = '100%';
  canvas.style.height = '100%';
  canvas.style.cursor = 'default';

  const context = options.context ?? canvas.getContext('2d');
  if (!context) {
    throw new Error('Canvas 2D context is not available');
  }
  const ctx: RenderContext = context;
  container.appendChild(canvas);

  let view: ViewState = createView();
  let viewWidth = 0;
  let viewHeight = 0;

  // Frame scheduling
  let frameId = 0;

  function requestFrame() {
    if (!frameId) {
      frameId = requestAnimationFrame(frame);
    }
  }

  function frame(now: number) {
    frameId = 0;
    const steps = clock.advance(now);
    for (let i = 0; i < steps; i++) {
      rack.tick();
    }
    render();

    if (rack.isAtRest()) {
      clock.reset();
    } else {
      requestFrame();
    }
  }

  function render() {
    const dpr = window.devicePixelRatio || 1;

    ctx.setTransform(dpr, 0, 0, dpr, 0, 0);
    ctx.clearRect(0, 0, viewWidth, viewHeight);
    ctx.fillStyle = style.background;
    ctx.fillRect(0, 0, viewWidth, viewHeight);

    ctx.setTransform(
      dpr * view.zoom, 0,
      0, dpr * view.zoom,
      dpr * view.offsetX, dpr * view.offsetY,
    );
    rackDrawable.draw(ctx);
  }

  // Pointer input
  function toRackPoint(e: MouseEvent): Point {
    const rect = canvas.getBoundingClientRect();
    return screenToRack(view, { x: e.clientX - rect.left, y: e.clientY - rect.top });
  }

  function onMouseDown(e: MouseEvent) {
    if (e.button !== 0) return;
    const p = toRackPoint(e);
    if (input.onPointerDown(p.x, p.y) !== null) {
      e.preventDefault();
      canvas.style.cursor = 'grabbing';
      requestFrame();
    }
  }

  function onMouseMove(e: MouseEvent) {
    const p = toRackPoint(e);
    if (input.isDragging()) {
      input.onPointerMove(p.x, p.y);
      requestFrame();
    } else if (e.target === canvas) {
      canvas.style.cursor = input.hitTest(p.x, p.y) === null ? 'default' : 'grab';
    }
  }

  function onMouseUp(e: MouseEvent) {
    if (e.button !== 0 || !input.isDragging()) return;
    const p = toRackPoint(e);
    input.onPointerUp(p.x, p.y);
    canvas.style.cursor = 'grab';
    requestFrame();
  }

  canvas.addEventListener('mousedown', onMouseDown);
  // Moves and releases outside the canvas still belong to the drag
  window.addEventListener('mousemove', onMouseMove);
  window.addEventListener('mouseup', onMouseUp);

  function resize(width: number, height: number) {
    const dpr = window.devicePixelRatio || 1;
    canvas.width = width * dpr;
    canvas.height = height * dpr;
    canvas.style.width = `${width}px`;
    canvas.style.height = `${height}px`;
    viewWidth = width;
    viewHeight = height;
    view = fitToRack(rack.bounds(), width, height);
    requestFrame();
  }

  const containerRect = container.getBoundingClientRect();
  resize(containerRect.width, containerRect.height);

  const resizeObserver = new ResizeObserver((entries) => {
    for (const entry of entries) {
      const { width, height } = entry.contentRect;
      if (width > 0 && height > 0) {
        resize(width, height);
      }
    }
  });
  resizeObserver.observe(container);

  return {
    getRack() { return rack; },
    getCanvas() { return canvas; },
    resize,
    destroy() {
      canvas.removeEventListener('mousedown', onMouseDown);
      window.removeEventListener('mousemove', onMouseMove);
      window.removeEventListener('mouseup', onMouseUp);
      resizeObserver.disconnect();
      if (frameId) cancelAnimationFrame(frameId);
      frameId = 0;
      container.removeChild(canvas);
    },
  };
}
