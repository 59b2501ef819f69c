/**
 * Track Builder
 *
 * Turns parsed block lists into frozen Track and BlockAsset values.
 * The tracker relies on blocks being sorted by start time, so that
 * precondition is checked here rather than during playback.
 */

import type {
  Block,
  BlockAsset,
  BlockInput,
  Track,
  ValidationError,
} from "@playhead/contracts";

import { MAX_VELOCITY } from "@playhead/contracts";

/**
 * Thrown when a track's blocks break the ordering or range invariants.
 */
export class MalformedTrackError extends Error {
  readonly errors: ValidationError[];

  constructor(errors: ValidationError[], trackIndex?: number) {
    const where = trackIndex === undefined ? "Track" : `Track ${trackIndex}`;
    super(`${where} is malformed: ${errors.map((e) => `${e.field} ${e.reason}`).join("; ")}`);
    this.name = "MalformedTrackError";
    this.errors = errors;
  }
}

/**
 * Check the block list without building anything.
 * Returns an empty array when the blocks can form a track.
 */
export function validateTrack(blocks: readonly BlockInput[]): ValidationError[] {
  const errors: ValidationError[] = [];

  blocks.forEach((block, i) => {
    if (!Number.isFinite(block.startTime) || !Number.isFinite(block.endTime)) {
      errors.push({ field: `blocks[${i}]`, reason: "has a non-finite time" });
      return;
    }

    if (block.endTime < block.startTime) {
      errors.push({
        field: `blocks[${i}].endTime`,
        reason: `ends before it starts (${block.startTime} > ${block.endTime})`,
      });
    }

    if (block.velocity < 0 || block.velocity > MAX_VELOCITY) {
      errors.push({
        field: `blocks[${i}].velocity`,
        reason: `is out of range (${block.velocity})`,
        hint: `0-${MAX_VELOCITY}`,
      });
    }

    if (i > 0 && block.startTime < blocks[i - 1].startTime) {
      errors.push({
        field: `blocks[${i}].startTime`,
        reason: "is earlier than the previous block",
        hint: "blocks must be sorted ascending by start time",
      });
    }
  });

  return errors;
}

/**
 * Build a frozen track, computing identifier range, max velocity and each
 * block's normalized velocity.
 *
 * @throws MalformedTrackError when validateTrack reports anything
 */
export function buildTrack(inputs: readonly BlockInput[], trackIndex?: number): Track {
  const errors = validateTrack(inputs);
  if (errors.length > 0) {
    throw new MalformedTrackError(errors, trackIndex);
  }

  if (inputs.length === 0) {
    return Object.freeze({
      blocks: Object.freeze([]),
      minIdentifier: 0,
      maxIdentifier: 0,
      maxVelocity: 0,
    });
  }

  let minIdentifier = Infinity;
  let maxIdentifier = -Infinity;
  let maxVelocity = 0;
  for (const input of inputs) {
    minIdentifier = Math.min(minIdentifier, input.identifier);
    maxIdentifier = Math.max(maxIdentifier, input.identifier);
    maxVelocity = Math.max(maxVelocity, input.velocity);
  }

  const blocks = inputs.map(
    (input): Block =>
      Object.freeze({
        startTime: input.startTime,
        endTime: input.endTime,
        lengthTime: input.endTime - input.startTime,
        identifier: input.identifier,
        velocity: input.velocity,
        normalizedVelocity: maxVelocity > 0 ? input.velocity / maxVelocity : 0,
      })
  );

  return Object.freeze({
    blocks: Object.freeze(blocks),
    minIdentifier,
    maxIdentifier,
    maxVelocity,
  });
}

/**
 * Build a named asset from one block list per track.
 */
export function buildAsset(name: string, tracks: readonly (readonly BlockInput[])[]): BlockAsset {
  return Object.freeze({
    name,
    tracks: Object.freeze(tracks.map((blocks, i) => buildTrack(blocks, i))),
  });
}
