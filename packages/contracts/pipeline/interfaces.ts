/**
 * Playback Interfaces
 *
 * Contracts between the playback session and its collaborators:
 * time sources feeding it and listeners consuming its block events.
 */

import type { Seconds } from "../core/time";
import type { Block, Track } from "../blocks/blocks";

// ============================================================================
// Time Sources
// ============================================================================

/**
 * How the session obtains its time.
 * - manual: a value set by the host
 * - game: elapsed wall-clock time minus a start offset
 * - audio: playback position of an audio clock
 * - timeline: position of an external timeline minus a start offset
 */
export type TimeSourceKind = "manual" | "game" | "audio" | "timeline";

/**
 * Supplies the playback time. Read at most once per step by the session.
 */
export interface ITimeSource {
  readonly kind: TimeSourceKind;

  /** Current playback time. May move backward or jump. */
  now(): Seconds;
}

// ============================================================================
// Cursors
// ============================================================================

/**
 * Read-only view of a per-track cursor.
 */
export interface TrackCursorView {
  readonly track: Track;
  /** Index of the last block visited, -1 before the first block */
  readonly lastIndex: number;
  /** Blocks whose [startTime, endTime) contains the last time seen, in activation order */
  readonly activeSet: ReadonlySet<Block>;
}

/**
 * Blocks that became active and inactive during one cursor update.
 * Enters are always reported before exits.
 */
export interface CursorUpdate {
  entered: Block[];
  exited: Block[];
}

// ============================================================================
// Block Events
// ============================================================================

export type BlockEventKind = "started" | "completed";

export interface BlockEvent {
  kind: BlockEventKind;
  trackIndex: number;
  /** Position of the block within its track */
  blockIndex: number;
  block: Block;
  /** Playback time of the step that raised the event */
  t: Seconds;
}

export type BlockListener = (event: BlockEvent) => void;

/**
 * An active block together with the track it belongs to.
 */
export interface ActiveBlock {
  trackIndex: number;
  block: Block;
}

/**
 * Maps block progress (0 at start, 1 at end) to a volume factor.
 */
export type ShapeCurve = (progress: number) => number;
