/**
 * Client-side tile rack board.
 *
 * Canvas rendering, pointer wiring and the fixed-rate tick loop for the
 * rack engine, plus the React components that host it.
 */

// Board (main entry point)
export type { RackBoard, RackBoardOptions } from './board.js';
export { createRackBoard } from './board.js';

// Types
export type {
  BlendMode,
  Drawable,
  RenderContext,
  RenderStyle,
  ViewState,
} from './types.js';
export { DEFAULT_RENDER_STYLE } from './types.js';

// View
export {
  createView,
  fitToRack,
  rackToScreen,
  screenToRack,
  MIN_ZOOM,
  MAX_ZOOM,
} from './view.js';

// Tick clock
export {
  FixedStepClock,
  DEFAULT_TICK_RATE_HZ,
  DEFAULT_MAX_STEPS_PER_FRAME,
} from './fixed-step.js';

// Renderer
export { createTileDrawable, createRackDrawable } from './rack-renderer.js';

// Letters
export { parseRackLetters, describeMove, MAX_RACK_LETTERS } from './letters.js';

// React
export { TileRackView } from './components/TileRackView.js';
export type { TileRackViewProps } from './components/TileRackView.js';
export { RackStatus } from './components/RackStatus.js';
export type { RackStatusProps } from './components/RackStatus.js';
export { useRackOrder, rackOrderReducer } from './hooks/useRackOrder.js';
export type { RackOrderState } from './hooks/useRackOrder.js';
