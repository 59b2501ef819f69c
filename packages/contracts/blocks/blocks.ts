/**
 * Block and Track Types
 *
 * A block is one timed event on a track (a note with a start and an end).
 * Tracks are built once from parsed input and then shared read-only by any
 * number of playback sessions.
 */

import type { Seconds } from "../core/time";
import type { MidiNoteNumber, Velocity } from "../primitives/primitives";

/**
 * Block as supplied by a parser, before track-level stats are known.
 */
export interface BlockInput {
  startTime: Seconds;
  endTime: Seconds;
  identifier: MidiNoteNumber;
  velocity: Velocity;
}

/**
 * A timed event on a track. Active while `startTime <= t < endTime`.
 */
export interface Block {
  readonly startTime: Seconds;
  readonly endTime: Seconds;
  readonly lengthTime: Seconds;
  readonly identifier: MidiNoteNumber;
  readonly velocity: Velocity;
  /** velocity / track.maxVelocity, 0 when the track is silent */
  readonly normalizedVelocity: number;
}

/**
 * Blocks sorted ascending by start time, plus stats used for normalization.
 * Blocks on the same track may overlap.
 */
export interface Track {
  readonly blocks: readonly Block[];
  readonly minIdentifier: MidiNoteNumber;
  readonly maxIdentifier: MidiNoteNumber;
  readonly maxVelocity: Velocity;
}

/**
 * A named collection of tracks (one parsed file).
 */
export interface BlockAsset {
  readonly name: string;
  readonly tracks: readonly Track[];
}

/**
 * Where a block sits relative to the playhead.
 * - past: the playhead is beyond its end
 * - active: the playhead is inside it
 * - upcoming: the playhead has not reached its start
 */
export type BlockState = "past" | "active" | "upcoming";
