/**
 * Playback Session
 *
 * Drives one cursor per track of an asset from a single time source.
 * The host calls step() once per frame with its frame counter; time and
 * volume are computed at most once per frame and cached against it.
 *
 * Order within a step: time is read, every track is updated (enters then
 * exits, tracks in asset order), listeners are called, then volume is
 * recomputed if configured to.
 */

import * as Tonal from "tonal";

import type {
  ActiveBlock,
  Block,
  BlockAsset,
  BlockEvent,
  BlockEventKind,
  BlockListener,
  CursorUpdate,
  ITimeSource,
  Seconds,
  StepCount,
  TrackCursorView,
} from "@playhead/contracts";

import { createCursor, resetCursor, type TrackCursor } from "../tracker/TrackCursor";
import { resyncCursor, updateCursor } from "../tracker/IntervalTracker";
import { VolumeAggregator, type VolumeConfig } from "../volume/VolumeAggregator";
import { StepCache } from "./StepCache";

/**
 * Configuration for a playback session.
 */
export interface PlaybackSessionConfig {
  /** Tracks to play. Shared read-only; the session owns only its cursors. */
  asset: BlockAsset;

  timeSource: ITimeSource;

  volume?: VolumeConfig;

  /**
   * Recompute volume at the end of every step instead of only on request.
   * @default false
   */
  updateVolumeEveryStep?: boolean;

  /**
   * Rescan tracks whenever time moves backward or holds still, so the
   * active sets match a full scan after any seek and a paused playhead
   * raises no events. Off by default: the incremental search
   * alone is used in both directions.
   * @default false
   */
  resyncOnRewind?: boolean;

  /**
   * Log block events to the console.
   * @default false
   */
  debug?: boolean;
}

const DEFAULT_CONFIG: Required<Omit<PlaybackSessionConfig, "asset" | "timeSource" | "volume">> = {
  updateVolumeEveryStep: false,
  resyncOnRewind: false,
  debug: false,
};

export class PlaybackSession {
  private config: Required<Omit<PlaybackSessionConfig, "volume">>;
  private cursors: TrackCursor[];
  private blockIndices: Map<Block, number>[];

  private startedListeners: BlockListener[] = [];
  private completedListeners: BlockListener[] = [];

  private timeCache = new StepCache<Seconds>();
  private volume: VolumeAggregator;

  /** Time of the last step that updated the cursors */
  private lastStepTime: Seconds | null = null;

  constructor(config: PlaybackSessionConfig) {
    const { volume, ...rest } = config;
    this.config = { ...DEFAULT_CONFIG, ...rest };
    this.volume = new VolumeAggregator(volume);

    this.cursors = config.asset.tracks.map((track) => createCursor(track));
    this.blockIndices = config.asset.tracks.map(
      (track) => new Map(track.blocks.map((block, i): [Block, number] => [block, i]))
    );
  }

  // === Stepping ===

  /**
   * Advance every track to the time of this step and notify listeners.
   * Returns the events raised, in the order listeners received them.
   */
  step(stepCount: StepCount): BlockEvent[] {
    const t = this.getCurrentTime(stepCount);
    const resync =
      this.config.resyncOnRewind && this.lastStepTime !== null && t <= this.lastStepTime;

    const events: BlockEvent[] = [];
    this.cursors.forEach((cursor, trackIndex) => {
      const update = resync ? resyncCursor(cursor, t) : updateCursor(cursor, t);
      this.collectEvents(update, trackIndex, t, events);
    });
    this.lastStepTime = t;

    // Active sets changed; a volume read earlier in this step is stale
    this.volume.invalidate();

    this.dispatch(events);

    if (this.config.updateVolumeEveryStep) {
      this.getCurrentVolume(stepCount);
    }

    return events;
  }

  /**
   * Deactivate everything and rewind every cursor before the first block.
   * Listeners receive a completion event for each block that was active.
   */
  reset(): BlockEvent[] {
    const t = this.lastStepTime ?? 0;
    const events: BlockEvent[] = [];

    this.cursors.forEach((cursor, trackIndex) => {
      const exited = resetCursor(cursor);
      this.collectEvents({ entered: [], exited }, trackIndex, t, events);
    });

    this.lastStepTime = null;
    this.timeCache.invalidate();
    this.volume.invalidate();

    this.dispatch(events);
    return events;
  }

  // === Queries ===

  getCurrentTime(stepCount: StepCount): Seconds {
    return this.timeCache.get(stepCount, () => this.config.timeSource.now());
  }

  /**
   * Sum of shaped block volumes across all tracks. May exceed 1.
   */
  getCurrentVolume(stepCount: StepCount): number {
    const t = this.getCurrentTime(stepCount);
    return this.volume.get(stepCount, this.cursors, t);
  }

  getActiveBlocks(): ActiveBlock[] {
    const active: ActiveBlock[] = [];
    this.cursors.forEach((cursor, trackIndex) => {
      for (const block of cursor.activeSet) {
        active.push({ trackIndex, block });
      }
    });
    return active;
  }

  getCursors(): readonly TrackCursorView[] {
    return this.cursors;
  }

  // === Listeners ===

  /**
   * Called when a block becomes active. Returns an unsubscribe function.
   */
  onBlockStarted(listener: BlockListener): () => void {
    return this.subscribe(this.startedListeners, listener);
  }

  /**
   * Called when a block stops being active. Returns an unsubscribe function.
   */
  onBlockCompleted(listener: BlockListener): () => void {
    return this.subscribe(this.completedListeners, listener);
  }

  // === Debug ===

  /**
   * Plain-text summary of the session: the current time, how many blocks
   * each track has active, and which ones.
   */
  formatDebugReport(): string {
    const t = this.lastStepTime ?? 0;
    const lines = [`MIDI ${this.config.asset.name} playing (${formatSeconds(t)}s)`];

    this.cursors.forEach((cursor, trackIndex) => {
      lines.push(`track ${trackIndex} - (${cursor.activeSet.size} active blocks)`);
      for (const block of cursor.activeSet) {
        lines.push(`  ${this.describeBlock(trackIndex, block)}`);
      }
    });

    return lines.join("\n");
  }

  // === Internals ===

  private collectEvents(
    update: CursorUpdate,
    trackIndex: number,
    t: Seconds,
    events: BlockEvent[]
  ): void {
    for (const block of update.entered) {
      events.push(this.makeEvent("started", trackIndex, block, t));
    }
    for (const block of update.exited) {
      events.push(this.makeEvent("completed", trackIndex, block, t));
    }
  }

  private makeEvent(
    kind: BlockEventKind,
    trackIndex: number,
    block: Block,
    t: Seconds
  ): BlockEvent {
    return {
      kind,
      trackIndex,
      blockIndex: this.blockIndices[trackIndex].get(block) ?? -1,
      block,
      t,
    };
  }

  private dispatch(events: BlockEvent[]): void {
    for (const event of events) {
      if (this.config.debug) {
        console.log(
          `[PlaybackSession] ${event.kind} track ${event.trackIndex} ${this.describeBlock(event.trackIndex, event.block)} at ${formatSeconds(event.t)}s`
        );
      }

      const listeners =
        event.kind === "started" ? this.startedListeners : this.completedListeners;
      // Copy so listeners may unsubscribe while being called
      for (const listener of [...listeners]) {
        listener(event);
      }
    }
  }

  private subscribe(listeners: BlockListener[], listener: BlockListener): () => void {
    listeners.push(listener);
    return () => {
      const idx = listeners.indexOf(listener);
      if (idx >= 0) listeners.splice(idx, 1);
    };
  }

  private describeBlock(trackIndex: number, block: Block): string {
    const index = this.blockIndices[trackIndex].get(block) ?? -1;
    const name = Tonal.Midi.midiToNoteName(block.identifier, { sharps: true });
    return `[Id ${index}][N ${name}][V ${block.velocity}]`;
  }
}

/**
 * Seconds with at most two decimals and no trailing zeros.
 */
function formatSeconds(t: Seconds): string {
  return String(Number(t.toFixed(2)));
}
