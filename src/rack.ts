/**
 * Tile rack: an ordered, fixed-size row of tiles.
 *
 * Owns the slot geometry, the drag lifecycle and the per-tick animation
 * that slides non-dragged tiles to their slots. While a drag is in
 * progress, the tiles between the dragged tile's slot and its prospective
 * target slot are displaced by one slot, giving a live preview of the drop.
 */

import type {
  BeginDragResult,
  Point,
  RackConfig,
  RackMove,
  Rect,
} from './types.js';
import { DEFAULT_RACK_CONFIG } from './types.js';
import { Tile } from './tile.js';
import type { TileView } from './tile.js';

/**
 * Throw if the configuration cannot describe a slot layout.
 */
export function validateRackConfig(config: RackConfig): void {
  if (!Number.isFinite(config.tileWidth) || config.tileWidth <= 0) {
    throw new Error(`Tile width must be a positive number, got ${config.tileWidth}`);
  }
  if (!Number.isFinite(config.tileHeight) || config.tileHeight <= 0) {
    throw new Error(`Tile height must be a positive number, got ${config.tileHeight}`);
  }
  if (!Number.isFinite(config.spacing) || config.spacing < 0) {
    throw new Error(`Tile spacing must be zero or more, got ${config.spacing}`);
  }
  if (!Number.isInteger(config.animationSteps) || config.animationSteps < 0) {
    throw new Error(
      `Animation steps must be a non-negative integer, got ${config.animationSteps}`,
    );
  }
}

export class Rack {
  readonly origin: Readonly<Point>;
  readonly config: Readonly<RackConfig>;

  private readonly sequence: Tile[];

  constructor(
    letters: string,
    origin: Point = { x: 0, y: 0 },
    config: RackConfig = DEFAULT_RACK_CONFIG,
  ) {
    const chars = Array.from(letters);
    if (chars.length === 0) {
      throw new Error('A rack needs at least one letter');
    }
    validateRackConfig(config);

    this.origin = { x: origin.x, y: origin.y };
    this.config = { ...config };
    this.sequence = chars.map((letter, i) => {
      const slot = this.slotPosition(i);
      return new Tile(letter, slot.x, slot.y, config.tileWidth, config.tileHeight);
    });
  }

  get size(): number {
    return this.sequence.length;
  }

  /** Tiles in slot order. */
  get tiles(): readonly TileView[] {
    return this.sequence;
  }

  private get slotPitch(): number {
    return this.config.tileWidth + this.config.spacing;
  }

  // -- Queries --

  /** Resting position of a slot. */
  slotPosition(index: number): Point {
    return {
      x: this.origin.x + index * this.slotPitch,
      y: this.origin.y,
    };
  }

  bounds(): Rect {
    return {
      x: this.origin.x,
      y: this.origin.y,
      width: this.size * this.slotPitch - this.config.spacing,
      height: this.config.tileHeight,
    };
  }

  /** The tile being dragged and its slot, or null when no drag is in progress. */
  draggingTile(): { index: number; tile: TileView } | null {
    return this.activeDrag();
  }

  /**
   * Slot whose center is nearest to `x`, clamped to the rack.
   */
  targetIndexForX(x: number): number {
    const raw = Math.floor(
      (x - this.origin.x + this.config.tileWidth / 2) / this.slotPitch,
    );
    // NaN lands on the first slot, infinities clamp like any other value
    if (Number.isNaN(raw)) return 0;
    return Math.max(0, Math.min(this.size - 1, raw));
  }

  /** Tiles in the order they must be drawn: the dragged tile last. */
  drawOrder(): readonly TileView[] {
    const resting = this.sequence.filter(t => !t.dragging);
    const dragged = this.sequence.filter(t => t.dragging);
    return [...resting, ...dragged];
  }

  letters(): string {
    return this.sequence.map(t => t.letter).join('');
  }

  /** True when nothing is dragging or moving and every tile sits on its slot. */
  isAtRest(): boolean {
    return this.sequence.every((tile, i) => {
      if (tile.dragging || tile.isAnimating) return false;
      const slot = this.slotPosition(i);
      return tile.x === slot.x && tile.y === slot.y;
    });
  }

  // -- Commands --

  beginDrag(index: number, pointerX: number, pointerY: number): BeginDragResult {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      return { ok: false, reason: `Slot ${index} is out of range (0-${this.size - 1})` };
    }
    if (this.draggingTile()) {
      return { ok: false, reason: 'A drag is already in progress' };
    }

    const tile = this.sequence[index];
    tile.startDrag({ x: pointerX - tile.x, y: pointerY - tile.y });
    tile.setAnimation(null);
    return { ok: true, index };
  }

  dragTo(pointerX: number, pointerY: number): void {
    const dragging = this.activeDrag();
    if (!dragging) return;

    const { tile } = dragging;
    const offset = tile.grabOffset ?? { x: 0, y: 0 };
    tile.setPosition(pointerX - offset.x, pointerY - offset.y);
  }

  /**
   * Drop the dragged tile into the slot nearest its current position.
   * The tiles in between shift one slot towards the vacated one.
   */
  endDrag(): RackMove | null {
    const dragging = this.activeDrag();
    if (!dragging) return null;

    const { index: from, tile } = dragging;
    tile.stopDrag();
    tile.setAnimation(null);

    const to = this.targetIndexForX(tile.x);
    this.sequence.splice(from, 1);
    this.sequence.splice(to, 0, tile);

    return { from, to, letter: tile.letter };
  }

  /**
   * Advance every non-dragged tile by one animation step towards its
   * current target slot.
   */
  tick(): void {
    const dragging = this.draggingTile();
    const from = dragging ? dragging.index : -1;
    const to = dragging ? this.targetIndexForX(dragging.tile.x) : -1;

    this.sequence.forEach((tile, i) => {
      if (tile.dragging) return;

      const target = this.slotPosition(i);
      if (dragging) {
        if (to <= i && i <= from) {
          target.x += this.slotPitch;
        } else if (from <= i && i <= to) {
          target.x -= this.slotPitch;
        }
      }
      this.stepToward(tile, target);
    });
  }

  private stepToward(tile: Tile, target: Point): void {
    const steps = this.config.animationSteps;
    const atTarget = tile.x === target.x && tile.y === target.y;

    if (atTarget || steps === 0 || (tile.animation && tile.animation.step >= steps)) {
      tile.setPosition(target.x, target.y);
      tile.setAnimation(null);
      return;
    }

    // The step vector is fixed for the whole run, even if the target moves.
    const stepVector = tile.animation?.stepVector ?? {
      x: (target.x - tile.x) / steps,
      y: (target.y - tile.y) / steps,
    };
    const step = (tile.animation?.step ?? 0) + 1;

    if (step >= steps) {
      tile.setPosition(target.x, target.y);
      tile.setAnimation(null);
      return;
    }

    tile.setPosition(tile.x + stepVector.x, tile.y + stepVector.y);
    tile.setAnimation({ step, stepVector: { x: stepVector.x, y: stepVector.y } });
  }

  private activeDrag(): { index: number; tile: Tile } | null {
    const index = this.sequence.findIndex(t => t.dragging);
    return index === -1 ? null : { index, tile: this.sequence[index] };
  }
}
