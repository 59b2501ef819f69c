import type { ITimeSource, Seconds } from "@playhead/contracts";

import type { TimelineClock } from "./clocks";

/**
 * Position of an external timeline minus a start offset.
 */
export class TimelineClockTimeSource implements ITimeSource {
  readonly kind = "timeline";

  constructor(
    private readonly timeline: TimelineClock,
    private readonly startOffset: Seconds = 0
  ) {}

  now(): Seconds {
    return this.timeline.time - this.startOffset;
  }
}
