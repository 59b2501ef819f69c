/**
 * Shape Curves
 *
 * Functions mapping block progress (0 at start, 1 at end) to a volume
 * factor. Any pure function works; these cover the usual fades.
 */

import type { ShapeCurve } from "@playhead/contracts";

/**
 * A point on a keyframed curve.
 */
export interface Keyframe {
  time: number;
  value: number;
}

/**
 * Straight line from (0, from) to (1, to), clamped outside [0, 1].
 */
export function linearCurve(from = 1, to = 0): ShapeCurve {
  return keyframeCurve([
    { time: 0, value: from },
    { time: 1, value: to },
  ]);
}

/** Full volume at onset fading to silence at release. */
export const DEFAULT_SHAPE: ShapeCurve = linearCurve(1, 0);

/**
 * Piecewise-linear curve through the given keyframes.
 * Holds the first and last values outside the keyed range.
 */
export function keyframeCurve(keyframes: readonly Keyframe[]): ShapeCurve {
  if (keyframes.length === 0) {
    throw new Error("keyframeCurve needs at least one keyframe");
  }

  const keys = [...keyframes].sort((a, b) => a.time - b.time);
  const first = keys[0];
  const last = keys[keys.length - 1];

  return (progress: number): number => {
    if (progress <= first.time) return first.value;
    if (progress >= last.time) return last.value;

    let i = 1;
    while (keys[i].time < progress) i++;

    const a = keys[i - 1];
    const b = keys[i];
    const span = b.time - a.time;
    if (span === 0) return b.value;
    return a.value + ((progress - a.time) / span) * (b.value - a.value);
  };
}

/**
 * Constant factor regardless of progress.
 */
export function constantCurve(value: number): ShapeCurve {
  return () => value;
}
