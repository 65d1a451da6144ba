/**
 * Audio Constants
 *
 * Centralized audio-related constants used across the synthesis engine.
 */

/** Default output sample rate in Hz */
export const DEFAULT_SAMPLE_RATE = 44_100;

/** Samples carried over from one device buffer into the next */
export const DEFAULT_LEFTOVER_SAMPLE_COUNT = 16;

/** 5ms of audio at the default rate, plus the leftover samples */
export const DEFAULT_BUFFER_SIZE =
  Math.floor(DEFAULT_SAMPLE_RATE / 200) + DEFAULT_LEFTOVER_SAMPLE_COUNT;

/** Default polyphony when none is given */
export const DEFAULT_MAX_NOTES = 16;

/**
 * Frequency of A4 in Hz
 * Used as the reference for MIDI and semitone calculations
 */
export const A4_FREQUENCY = 440;

/** MIDI note number of A4 */
export const A4_MIDI_NOTE = 69;

export const TWO_PI = 2 * Math.PI;

/**
 * Convert a MIDI note number to frequency (69 = A4 = 440Hz)
 */
export function midiToFrequency(midiNote: number): number {
  return A4_FREQUENCY * Math.pow(2, (midiNote - A4_MIDI_NOTE) / 12);
}

/**
 * Convert a semitone offset from a base frequency (A4 by default) to frequency
 */
export function semitoneToFrequency(semitone: number, baseFrequency: number = A4_FREQUENCY): number {
  return baseFrequency * Math.pow(2, semitone / 12);
}
