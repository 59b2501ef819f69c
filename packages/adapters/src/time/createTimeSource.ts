/**
 * Time Source Selection
 *
 * Builds the time source for a configured kind. The audio and timeline
 * kinds need their clock at construction; selecting one without it fails
 * here rather than on the first frame.
 */

import type { ITimeSource, Seconds, TimeSourceKind } from "@playhead/contracts";

import type { AudioClock, TimelineClock, WallClock } from "./clocks";
import { AudioClockTimeSource } from "./AudioClockTimeSource";
import { GameClockTimeSource } from "./GameClockTimeSource";
import { ManualTimeSource } from "./ManualTimeSource";
import { TimelineClockTimeSource } from "./TimelineClockTimeSource";

export type TimeSourceConfig =
  | { kind: "manual"; value?: Seconds }
  | { kind: "game"; startOffset?: Seconds; clock?: WallClock }
  | { kind: "audio"; audio?: AudioClock | null }
  | { kind: "timeline"; timeline?: TimelineClock | null; startOffset?: Seconds };

/**
 * Thrown when the selected kind of time source has no clock to read from.
 */
export class MissingTimeSourceError extends Error {
  readonly kind: TimeSourceKind;

  constructor(kind: TimeSourceKind) {
    super(`Time source "${kind}" selected but no ${kind} clock was provided`);
    this.name = "MissingTimeSourceError";
    this.kind = kind;
  }
}

export function createTimeSource(config: TimeSourceConfig): ITimeSource {
  switch (config.kind) {
    case "manual":
      return new ManualTimeSource(config.value);
    case "game":
      return new GameClockTimeSource(config.startOffset, config.clock);
    case "audio":
      if (!config.audio) throw new MissingTimeSourceError("audio");
      return new AudioClockTimeSource(config.audio);
    case "timeline":
      if (!config.timeline) throw new MissingTimeSourceError("timeline");
      return new TimelineClockTimeSource(config.timeline, config.startOffset);
  }
}
