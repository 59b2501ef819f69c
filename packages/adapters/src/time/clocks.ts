/**
 * External clocks the time sources read from.
 * Kept minimal so tests can supply plain objects.
 */

import type { Seconds } from "@playhead/contracts";

/**
 * Anything exposing an audio playback position, such as an AudioContext or
 * an HTMLMediaElement.
 */
export interface AudioClock {
  readonly currentTime: Seconds;
}

/**
 * An external timeline (sequencer, animation director) with a position.
 */
export interface TimelineClock {
  readonly time: Seconds;
}

/** Monotonic wall-clock reading in seconds. */
export type WallClock = () => Seconds;

export const performanceClock: WallClock = () => performance.now() / 1000;
