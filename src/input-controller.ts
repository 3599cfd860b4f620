/**
 * InputController — turns pointer press/move/release into rack drags.
 *
 * Coordinates are in rack space; converting from screen pixels is the
 * caller's job.
 */

import type { RackMove } from './types.js';
import type { Rack } from './rack.js';

export interface InputControllerOptions {
  /** Called after every drop, including a drop back into the same slot. */
  onReorder?: (move: RackMove, letters: string) => void;
}

export class InputController {
  constructor(
    private readonly rack: Rack,
    private readonly options: InputControllerOptions = {},
  ) {}

  /**
   * Slot index of the topmost tile whose rectangle contains the point.
   * Points in the gaps between tiles hit nothing.
   */
  hitTest(x: number, y: number): number | null {
    const ordered = this.rack.drawOrder();
    for (let i = ordered.length - 1; i >= 0; i--) {
      const tile = ordered[i];
      if (tile.contains(x, y)) {
        return this.rack.tiles.indexOf(tile);
      }
    }
    return null;
  }

  /** Start dragging the tile under the pointer. Returns its slot, or null. */
  onPointerDown(x: number, y: number): number | null {
    const index = this.hitTest(x, y);
    if (index === null) return null;

    const result = this.rack.beginDrag(index, x, y);
    return result.ok ? result.index : null;
  }

  onPointerMove(x: number, y: number): void {
    if (!this.rack.draggingTile()) return;
    this.rack.dragTo(x, y);
  }

  /** Drop the dragged tile at the release point. */
  onPointerUp(x: number, y: number): RackMove | null {
    if (!this.rack.draggingTile()) return null;

    this.rack.dragTo(x, y);
    const move = this.rack.endDrag();
    if (move) {
      this.options.onReorder?.(move, this.rack.letters());
    }
    return move;
  }

  isDragging(): boolean {
    return this.rack.draggingTile() !== null;
  }
}
