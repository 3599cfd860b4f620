/**
 * Tile Rack — reordering and animation engine
 *
 * Public API surface for the rack, its tiles and pointer input.
 */

// Types
export type {
  Point,
  Rect,
  AnimationState,
  RackConfig,
  BeginDragResult,
  RackMove,
} from './types.js';

export { DEFAULT_RACK_CONFIG, DEFAULT_LETTERS } from './types.js';

// Engine
export { Tile } from './tile.js';
export type { TileView } from './tile.js';
export { Rack, validateRackConfig } from './rack.js';
export { InputController } from './input-controller.js';
export type { InputControllerOptions } from './input-controller.js';
