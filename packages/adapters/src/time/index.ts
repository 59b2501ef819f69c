export type { AudioClock, TimelineClock, WallClock } from "./clocks";
export { performanceClock } from "./clocks";
export { ManualTimeSource } from "./ManualTimeSource";
export { GameClockTimeSource } from "./GameClockTimeSource";
export { AudioClockTimeSource } from "./AudioClockTimeSource";
export { TimelineClockTimeSource } from "./TimelineClockTimeSource";
export {
  createTimeSource,
  MissingTimeSourceError,
  type TimeSourceConfig,
} from "./createTimeSource";
