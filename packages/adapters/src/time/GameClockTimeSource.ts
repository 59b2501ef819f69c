import type { ITimeSource, Seconds } from "@playhead/contracts";

import { performanceClock, type WallClock } from "./clocks";

/**
 * Elapsed wall-clock time minus a start offset.
 */
export class GameClockTimeSource implements ITimeSource {
  readonly kind = "game";

  private clock: WallClock;
  private startOffset: Seconds;

  constructor(startOffset: Seconds = 0, clock: WallClock = performanceClock) {
    this.startOffset = startOffset;
    this.clock = clock;
  }

  now(): Seconds {
    return this.clock() - this.startOffset;
  }
}
