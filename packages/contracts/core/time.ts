export type Seconds = number;   // playback time, may be negative
export type StepCount = number; // host tick counter, increases once per frame
