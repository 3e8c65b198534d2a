/**
 * Progress Throttle
 *
 * Lets one progress update through per percent step or per interval,
 * whichever comes first. The first update of a phase always passes.
 */

export const DEFAULT_STEP_PERCENT = 10;
export const DEFAULT_INTERVAL_MS = 5000;

export class ProgressThrottle {
  private lastPercent: number | null = null;
  private lastEmitAt = 0;
  private readonly stepPercent: number;
  private readonly intervalMs: number;
  private readonly now: () => number;

  constructor(
    stepPercent: number = DEFAULT_STEP_PERCENT,
    intervalMs: number = DEFAULT_INTERVAL_MS,
    now: () => number = Date.now
  ) {
    this.stepPercent = stepPercent;
    this.intervalMs = intervalMs;
    this.now = now;
  }

  shouldEmit(percent: number): boolean {
    const at = this.now();
    const due =
      this.lastPercent === null ||
      percent - this.lastPercent >= this.stepPercent ||
      at - this.lastEmitAt >= this.intervalMs;

    if (due) {
      this.lastPercent = percent;
      this.lastEmitAt = at;
    }
    return due;
  }

  /**
   * Start a new phase
   */
  reset(): void {
    this.lastPercent = null;
  }
}
