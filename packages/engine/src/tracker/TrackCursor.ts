import type { Block, Track, TrackCursorView } from "@playhead/contracts";

/**
 * Per-track playback state. Owned by one session, mutated only by the
 * IntervalTracker functions.
 */
export interface TrackCursor extends TrackCursorView {
  lastIndex: number;
  readonly activeSet: Set<Block>;
}

export function createCursor(track: Track): TrackCursor {
  return {
    track,
    lastIndex: -1,
    activeSet: new Set(),
  };
}

/**
 * Put the cursor back before the first block.
 * Returns the blocks that were active, in activation order.
 */
export function resetCursor(cursor: TrackCursor): Block[] {
  const wasActive = [...cursor.activeSet];
  cursor.activeSet.clear();
  cursor.lastIndex = -1;
  return wasActive;
}
