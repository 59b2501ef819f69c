/**
 * Primitive MIDI-level types shared by blocks and tracks.
 */

export type MidiNoteNumber = number; // 0-127
export type Velocity = number;       // 0-127

/** Highest velocity the MIDI protocol can express. */
export const MAX_VELOCITY: Velocity = 127;
