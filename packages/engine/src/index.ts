// Tracks
export {
  buildTrack,
  buildAsset,
  validateTrack,
  MalformedTrackError,
} from "./tracks/TrackBuilder";

// Tracker
export { createCursor, resetCursor, type TrackCursor } from "./tracker/TrackCursor";
export {
  updateCursor,
  resyncCursor,
  findActiveBlocks,
  classifyBlock,
} from "./tracker/IntervalTracker";

// Volume
export {
  computeVolume,
  VolumeAggregator,
  type VolumeConfig,
} from "./volume/VolumeAggregator";
export {
  linearCurve,
  keyframeCurve,
  constantCurve,
  DEFAULT_SHAPE,
  type Keyframe,
} from "./volume/curves";

// Session
export { StepCache } from "./session/StepCache";
export { PlaybackSession, type PlaybackSessionConfig } from "./session/PlaybackSession";
