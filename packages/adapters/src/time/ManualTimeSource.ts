import type { ITimeSource, Seconds } from "@playhead/contracts";

/**
 * Time set explicitly by the host, e.g. from a scrub bar.
 */
export class ManualTimeSource implements ITimeSource {
  readonly kind = "manual";

  private value: Seconds;

  constructor(initial: Seconds = 0) {
    this.value = initial;
  }

  set(value: Seconds): void {
    this.value = value;
  }

  now(): Seconds {
    return this.value;
  }
}
