/**
 * Volume Aggregator
 *
 * Reduces the active blocks of every track to one volume value: each block
 * contributes shape(progress) scaled by its velocity, and contributions are
 * summed without clamping, so overlapping blocks can exceed 1.
 */

import type { Seconds, ShapeCurve, StepCount, TrackCursorView } from "@playhead/contracts";

import { MAX_VELOCITY } from "@playhead/contracts";

import { DEFAULT_SHAPE } from "./curves";
import { StepCache } from "../session/StepCache";

export interface VolumeConfig {
  /**
   * Volume factor over a block's progress.
   * @default linear fade from 1 to 0
   */
  shape?: ShapeCurve;

  /**
   * Weight blocks by velocity relative to their own track's loudest block
   * rather than relative to the maximum MIDI velocity.
   * @default true
   */
  normalizePerTrack?: boolean;
}

const DEFAULT_CONFIG: Required<VolumeConfig> = {
  shape: DEFAULT_SHAPE,
  normalizePerTrack: true,
};

export function computeVolume(
  cursors: readonly TrackCursorView[],
  t: Seconds,
  config: VolumeConfig = {}
): number {
  const { shape, normalizePerTrack } = { ...DEFAULT_CONFIG, ...config };

  let volume = 0;
  for (const cursor of cursors) {
    for (const block of cursor.activeSet) {
      const progress = (t - block.startTime) / (block.endTime - block.startTime);
      const weight = normalizePerTrack
        ? block.normalizedVelocity
        : block.velocity / MAX_VELOCITY;
      volume += shape(progress) * weight;
    }
  }
  return volume;
}

/**
 * computeVolume with a per-step cache.
 */
export class VolumeAggregator {
  private config: Required<VolumeConfig>;
  private cache = new StepCache<number>();

  constructor(config: VolumeConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get(step: StepCount, cursors: readonly TrackCursorView[], t: Seconds): number {
    return this.cache.get(step, () => computeVolume(cursors, t, this.config));
  }

  invalidate(): void {
    this.cache.invalidate();
  }
}
