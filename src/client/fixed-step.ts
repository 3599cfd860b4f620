/**
 * Fixed-rate tick clock.
 *
 * Rack animation advances in whole ticks at a fixed rate, independent of
 * how often the browser paints. Each animation frame feeds its timestamp in
 * and gets back the number of ticks owed since the previous frame.
 */

/** Engine ticks per second. */
export const DEFAULT_TICK_RATE_HZ = 500;

/** Ticks run in one frame at most; older backlog is dropped. */
export const DEFAULT_MAX_STEPS_PER_FRAME = 250;

export class FixedStepClock {
  readonly stepMs: number;
  private accumulator = 0;
  private lastTime: number | null = null;

  constructor(
    tickRateHz: number = DEFAULT_TICK_RATE_HZ,
    private readonly maxStepsPerFrame: number = DEFAULT_MAX_STEPS_PER_FRAME,
  ) {
    if (!Number.isFinite(tickRateHz) || tickRateHz <= 0) {
      throw new Error(`Tick rate must be a positive number, got ${tickRateHz}`);
    }
    if (!Number.isInteger(maxStepsPerFrame) || maxStepsPerFrame < 1) {
      throw new Error(`Max steps per frame must be a positive integer, got ${maxStepsPerFrame}`);
    }
    this.stepMs = 1000 / tickRateHz;
  }

  /**
   * Feed a frame timestamp in milliseconds. Returns how many ticks to run.
   * The first timestamp after construction or reset only starts the clock.
   */
  advance(now: number): number {
    if (this.lastTime === null) {
      this.lastTime = now;
      return 0;
    }

    // Timestamps that go backwards count as no time at all
    this.accumulator += Math.max(0, now - this.lastTime);
    this.lastTime = now;

    const steps = Math.floor(this.accumulator / this.stepMs);
    if (steps > this.maxStepsPerFrame) {
      this.accumulator = 0;
      return this.maxStepsPerFrame;
    }
    this.accumulator -= steps * this.stepMs;
    return steps;
  }

  /** Forget elapsed time, e.g. after the loop has been idle. */
  reset(): void {
    this.accumulator = 0;
    this.lastTime = null;
  }
}
