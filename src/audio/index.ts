/**
 * Audio Module Exports
 *
 * This file re-exports all audio-related modules for convenient importing.
 */

// Synth engine
export { Synth } from './synth';

// Presets
export {
  SYNTH_PRESETS,
  createPresetSynth,
  getSynthPreset,
  getSynthPresetNames,
  isSynthPresetName,
  type SynthPreset,
  type SynthPresetName,
  type PresetSynthOptions,
} from './presets';

// Configuration
export {
  DEFAULT_CONFIG,
  createConfig,
  configFromEnv,
  validateConfig,
  type SynthConfig,
} from './config';

// Notes
export {
  NoteList,
  type NoteId,
  type NoteListMetrics,
  type NoteListOptions,
} from './note-list';
export { heldState, holding, released, type Note, type NoteState } from './note';

// Oscillators
export {
  SineOscillator,
  SawOscillator,
  SquareOscillator,
  TriangleOscillator,
  HarmonicOscillator,
  NoiseOscillator,
  createOscillator,
  type Oscillator,
  type OscillatorKind,
  type OscillatorDefinition,
  type PhaseState,
  type HarmonicState,
  type NoiseState,
  type NoiseOscillatorOptions,
} from './oscillator';

// Envelopes
export {
  AdsrEnvelope,
  ExponentialAdsrEnvelope,
  createEnvelope,
  sampleExp,
  DEFAULT_EXP_END_X,
  type Envelope,
  type EnvelopeKind,
  type EnvelopeDefinition,
  type AdsrParams,
} from './envelope';

// Constants and pitch helpers
export {
  A4_FREQUENCY,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_LEFTOVER_SAMPLE_COUNT,
  DEFAULT_MAX_NOTES,
  DEFAULT_SAMPLE_RATE,
  midiToFrequency,
  semitoneToFrequency,
} from './constants';
