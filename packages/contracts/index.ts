export * from "./core/time";

// Primitive MIDI types (MidiNoteNumber, Velocity)
export * from "./primitives/primitives";

// Blocks, tracks and assets
export * from "./blocks/blocks";

export * from "./pipeline/interfaces";

export * from "./diagnostics/diagnostics";
