import type { StepCount } from "@playhead/contracts";

/**
 * Holds one value per host step. compute() runs on the first request of a
 * step; later requests in the same step get the stored value.
 */
export class StepCache<T> {
  private entry: { step: StepCount; value: T } | null = null;

  get(step: StepCount, compute: () => T): T {
    if (this.entry === null || this.entry.step !== step) {
      this.entry = { step, value: compute() };
    }
    return this.entry.value;
  }

  invalidate(): void {
    this.entry = null;
  }
}
