/**
 * Preset synth patches: an oscillator plus an envelope, by name.
 */

import { DEFAULT_CONFIG, type SynthConfig } from './config';
import { DEFAULT_MAX_NOTES } from './constants';
import { createEnvelope, type EnvelopeDefinition } from './envelope';
import { createOscillator, type OscillatorDefinition } from './oscillator';
import { Synth } from './synth';

export interface SynthPreset {
  oscillator: OscillatorDefinition;
  envelope: EnvelopeDefinition;
}

export const SYNTH_PRESETS = {
  // === CORE SYNTHS ===
  bass: {
    oscillator: { kind: 'saw' },
    envelope: { kind: 'linear', attack: 0.01, decay: 0.2, sustain: 0.5, release: 0.1 },
  },
  lead: {
    oscillator: { kind: 'square' },
    envelope: { kind: 'linear', attack: 0.01, decay: 0.1, sustain: 0.8, release: 0.3 },
  },
  pad: {
    oscillator: { kind: 'sine' },
    envelope: { kind: 'exponential', attack: 0.05, decay: 0.3, sustain: 0.85, release: 1.0 },
  },
  pluck: {
    oscillator: { kind: 'triangle' },
    envelope: { kind: 'exponential', attack: 0.005, decay: 0.4, sustain: 0.15, release: 0.25, endX: 6 },
  },

  // === KEYS ===
  organ: {
    // Drawbar-style stack of the first four harmonics
    oscillator: { kind: 'harmonic', amplitudes: [1, 0.8, 0.6, 0.4] },
    envelope: { kind: 'linear', attack: 0.01, decay: 0.1, sustain: 0.8, release: 0.15 },
  },
  rhodes: {
    oscillator: { kind: 'harmonic', amplitudes: [1, 0.3, 0.1] },
    envelope: { kind: 'exponential', attack: 0.01, decay: 0.4, sustain: 0.65, release: 0.6 },
  },
  bell: {
    oscillator: { kind: 'sine' },
    envelope: { kind: 'exponential', attack: 0.001, decay: 0.5, sustain: 0.2, release: 1.0 },
  },

  // === TEXTURES ===
  strings: {
    oscillator: { kind: 'saw' },
    envelope: { kind: 'exponential', attack: 0.05, decay: 0.3, sustain: 0.8, release: 0.8, endX: 3 },
  },
  hiss: {
    oscillator: { kind: 'noise' },
    envelope: { kind: 'linear', attack: 0.001, decay: 0.05, sustain: 0.3, release: 0.2 },
  },
} as const satisfies Record<string, SynthPreset>;

export type SynthPresetName = keyof typeof SYNTH_PRESETS;

export function getSynthPresetNames(): SynthPresetName[] {
  return Object.keys(SYNTH_PRESETS).filter(isSynthPresetName);
}

export function isSynthPresetName(name: string): name is SynthPresetName {
  return Object.prototype.hasOwnProperty.call(SYNTH_PRESETS, name);
}

export function getSynthPreset(name: string): SynthPreset | undefined {
  return isSynthPresetName(name) ? SYNTH_PRESETS[name] : undefined;
}

export interface PresetSynthOptions {
  config?: SynthConfig;
  maxNotes?: number;
}

/**
 * Build a synth for a named preset. Throws a RangeError for unknown names.
 */
export function createPresetSynth(name: string, options: PresetSynthOptions = {}): Synth<unknown> {
  const preset = getSynthPreset(name);
  if (!preset) {
    throw new RangeError(
      `Unknown synth preset "${name}". Available: ${getSynthPresetNames().join(', ')}`
    );
  }

  return new Synth(
    options.config ?? DEFAULT_CONFIG,
    createOscillator(preset.oscillator),
    createEnvelope(preset.envelope),
    options.maxNotes ?? DEFAULT_MAX_NOTES
  );
}
