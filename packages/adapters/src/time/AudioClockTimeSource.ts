import type { ITimeSource, Seconds } from "@playhead/contracts";

import type { AudioClock } from "./clocks";

/**
 * Playback position of an audio clock. Follows the audio through pauses
 * and seeks, so blocks stay aligned with what is heard.
 */
export class AudioClockTimeSource implements ITimeSource {
  readonly kind = "audio";

  constructor(private readonly audio: AudioClock) {}

  now(): Seconds {
    return this.audio.currentTime;
  }
}
