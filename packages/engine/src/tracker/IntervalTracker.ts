/**
 * Interval Tracker
 *
 * Keeps a cursor's active set in step with the playhead. Each update walks
 * the track from the cursor's last visited index instead of rescanning it,
 * so smooth playback costs a step or two per frame.
 *
 * The search direction is chosen by comparing t with the start time of the
 * block at lastIndex, not with the previous time. Rewinds can therefore
 * leave the active set short of what a rescan would give; resyncCursor
 * exists for hosts that need exact state after a seek.
 */

import type { Block, BlockState, CursorUpdate, Seconds, Track } from "@playhead/contracts";

import type { TrackCursor } from "./TrackCursor";

/**
 * Advance the cursor to time t.
 * Enters are collected by the directional search, exits by a sweep of the
 * whole active set afterwards.
 */
export function updateCursor(cursor: TrackCursor, t: Seconds): CursorUpdate {
  const blocks = cursor.track.blocks;
  const entered: Block[] = [];

  if (cursor.lastIndex < 0 || blocks[cursor.lastIndex].startTime < t) {
    searchForward(cursor, t, entered);
  } else {
    searchBackward(cursor, t, entered);
  }

  const exited = sweepExited(cursor, t);
  return { entered, exited };
}

/**
 * Visit every block starting at or before t, past lastIndex.
 * Blocks already over by t are skipped but still move lastIndex.
 */
function searchForward(cursor: TrackCursor, t: Seconds, entered: Block[]): void {
  const blocks = cursor.track.blocks;

  for (let i = cursor.lastIndex + 1; i < blocks.length; i++) {
    const block = blocks[i];
    if (block.startTime > t) break;

    if (t < block.endTime) {
      activate(cursor, block, entered);
    }
    cursor.lastIndex = i;
  }
}

/**
 * Step back to the nearest earlier block starting at or before t and
 * activate it. Activates at most one block.
 */
function searchBackward(cursor: TrackCursor, t: Seconds, entered: Block[]): void {
  const blocks = cursor.track.blocks;

  for (let i = cursor.lastIndex - 1; i >= 0; i--) {
    const block = blocks[i];
    if (block.startTime <= t) {
      activate(cursor, block, entered);
      cursor.lastIndex = i;
      return;
    }
  }

  cursor.lastIndex = -1;
}

function activate(cursor: TrackCursor, block: Block, entered: Block[]): void {
  if (cursor.activeSet.has(block)) return;
  cursor.activeSet.add(block);
  entered.push(block);
}

function sweepExited(cursor: TrackCursor, t: Seconds): Block[] {
  const exited: Block[] = [];
  for (const block of cursor.activeSet) {
    if (t >= block.endTime || t < block.startTime) {
      exited.push(block);
    }
  }
  for (const block of exited) {
    cursor.activeSet.delete(block);
  }
  return exited;
}

/**
 * Blocks containing t, found by scanning the whole track.
 */
export function findActiveBlocks(track: Track, t: Seconds): Block[] {
  return track.blocks.filter((block) => block.startTime <= t && t < block.endTime);
}

/**
 * Rebuild the cursor's state at t from a full scan.
 * Reports the difference against the previous active set, so listeners see
 * the same enter/exit pairs they would from continuous playback.
 */
export function resyncCursor(cursor: TrackCursor, t: Seconds): CursorUpdate {
  const blocks = cursor.track.blocks;
  const target = new Set(findActiveBlocks(cursor.track, t));

  const exited: Block[] = [];
  for (const block of cursor.activeSet) {
    if (!target.has(block)) exited.push(block);
  }
  for (const block of exited) {
    cursor.activeSet.delete(block);
  }

  const entered: Block[] = [];
  for (const block of target) {
    activate(cursor, block, entered);
  }

  let lastIndex = -1;
  while (lastIndex + 1 < blocks.length && blocks[lastIndex + 1].startTime <= t) {
    lastIndex++;
  }
  cursor.lastIndex = lastIndex;

  return { entered, exited };
}

export function classifyBlock(block: Block, t: Seconds): BlockState {
  if (t > block.endTime) return "past";
  if (t < block.startTime) return "upcoming";
  return "active";
}
