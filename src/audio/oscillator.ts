/**
 * Oscillators
 *
 * An oscillator is shared, read-only configuration. Everything that changes
 * while a note plays (phase, random state) lives in a state object created
 * per note by `createState()` and owned by that note.
 *
 * `fillSamples` ADDS its output to the buffer instead of overwriting it, so
 * oscillators compose: several can be layered into one buffer without
 * temporary buffers per layer.
 */

import { TWO_PI } from './constants';
import { wrap } from '../utils/math';

export type OscillatorKind = 'sine' | 'saw' | 'square' | 'triangle' | 'harmonic' | 'noise';

export interface Oscillator<S> {
  readonly kind: OscillatorKind;

  /** Fresh per-note state */
  createState(): S;

  /**
   * Add `amp`-scaled samples to `buffer`, advancing `state` once per sample.
   *
   * @param deltaT - Time between samples, in seconds
   * @param freq - Base frequency, in Hz
   * @param amp - Amplitude of the contribution
   */
  fillSamples(state: S, buffer: Float32Array, deltaT: number, freq: number, amp: number): void;
}

export interface PhaseState {
  phase: number;
}

// =============================================================================
// Periodic waveforms
// =============================================================================

/** Phase runs over [0, 2π) */
export class SineOscillator implements Oscillator<PhaseState> {
  readonly kind = 'sine';

  createState(): PhaseState {
    return { phase: 0 };
  }

  fillSamples(state: PhaseState, buffer: Float32Array, deltaT: number, freq: number, amp: number): void {
    const increment = TWO_PI * freq * deltaT;
    let phase = state.phase;
    for (let i = 0; i < buffer.length; i++) {
      buffer[i] += Math.sin(phase) * amp;
      phase = wrap(phase + increment, TWO_PI);
    }
    state.phase = phase;
  }
}

/**
 * Shared loop for waveforms whose phase runs over [0, 1)
 */
function fillUnitPhase(
  shape: (phase: number) => number,
  state: PhaseState,
  buffer: Float32Array,
  deltaT: number,
  freq: number,
  amp: number
): void {
  const increment = freq * deltaT;
  let phase = state.phase;
  for (let i = 0; i < buffer.length; i++) {
    buffer[i] += shape(phase) * amp;
    phase = wrap(phase + increment, 1);
  }
  state.phase = phase;
}

const sawShape = (phase: number): number => 2 * phase - 1;
const squareShape = (phase: number): number => (phase < 0.5 ? 1 : -1);
const triangleShape = (phase: number): number => 1 - 4 * Math.abs(phase - 0.5);

/** Rises from -1 to 1 once per cycle */
export class SawOscillator implements Oscillator<PhaseState> {
  readonly kind = 'saw';

  createState(): PhaseState {
    return { phase: 0 };
  }

  fillSamples(state: PhaseState, buffer: Float32Array, deltaT: number, freq: number, amp: number): void {
    fillUnitPhase(sawShape, state, buffer, deltaT, freq, amp);
  }
}

/** +amp for the first half of the cycle, -amp for the second */
export class SquareOscillator implements Oscillator<PhaseState> {
  readonly kind = 'square';

  createState(): PhaseState {
    return { phase: 0 };
  }

  fillSamples(state: PhaseState, buffer: Float32Array, deltaT: number, freq: number, amp: number): void {
    fillUnitPhase(squareShape, state, buffer, deltaT, freq, amp);
  }
}

/** Starts at -1, peaks at 1 half way through the cycle */
export class TriangleOscillator implements Oscillator<PhaseState> {
  readonly kind = 'triangle';

  createState(): PhaseState {
    return { phase: 0 };
  }

  fillSamples(state: PhaseState, buffer: Float32Array, deltaT: number, freq: number, amp: number): void {
    fillUnitPhase(triangleShape, state, buffer, deltaT, freq, amp);
  }
}

// =============================================================================
// Harmonic stack
// =============================================================================

export interface HarmonicState {
  partials: PhaseState[];
}

/**
 * Sum of sine partials. Harmonic k (1-based) plays at `freq * k` with
 * amplitude `amplitudes[k - 1] * amp / k`.
 *
 * Unlike the other oscillators this one clears the buffer first, since it
 * builds its waveform from scratch.
 */
export class HarmonicOscillator implements Oscillator<HarmonicState> {
  readonly kind = 'harmonic';
  readonly amplitudes: readonly number[];
  private readonly sine = new SineOscillator();

  constructor(amplitudes: readonly number[]) {
    if (amplitudes.length === 0) {
      throw new RangeError('HarmonicOscillator needs at least one harmonic amplitude');
    }
    if (!amplitudes.every(Number.isFinite)) {
      throw new RangeError(`Harmonic amplitudes must be finite numbers, got [${amplitudes.join(', ')}]`);
    }
    this.amplitudes = [...amplitudes];
  }

  createState(): HarmonicState {
    return { partials: this.amplitudes.map(() => this.sine.createState()) };
  }

  fillSamples(state: HarmonicState, buffer: Float32Array, deltaT: number, freq: number, amp: number): void {
    buffer.fill(0);
    for (let ix = 0; ix < this.amplitudes.length; ix++) {
      const multiplier = ix + 1;
      this.sine.fillSamples(
        state.partials[ix],
        buffer,
        deltaT,
        freq * multiplier,
        (this.amplitudes[ix] * amp) / multiplier
      );
    }
  }
}

// =============================================================================
// Noise
// =============================================================================

export interface NoiseState {
  /** xorshift32 state, never 0 */
  seed: number;
}

const FALLBACK_SEED = 0x12345678;
const UINT32_RANGE = 0x1_0000_0000;

function randomSeed(): number {
  return ((Date.now() ^ Math.floor(Math.random() * 0xffffffff)) | 0) || FALLBACK_SEED;
}

/**
 * Advance a xorshift32 state and map it to [-1, 1)
 */
function nextNoiseSample(state: NoiseState): number {
  let x = state.seed | 0;
  x ^= x << 13;
  x ^= x >>> 17;
  x ^= x << 5;
  state.seed = x | 0;
  return ((x >>> 0) / UINT32_RANGE) * 2 - 1;
}

export interface NoiseOscillatorOptions {
  /**
   * Seed every note's generator with this value instead of a random one.
   * Notes started with the same seed produce the same noise.
   */
  seed?: number;
}

/**
 * White noise in [-amp, amp). Frequency and deltaT are ignored.
 * Each note carries its own generator so notes never share random state.
 */
export class NoiseOscillator implements Oscillator<NoiseState> {
  readonly kind = 'noise';
  private readonly seed?: number;

  constructor(options: NoiseOscillatorOptions = {}) {
    if (options.seed !== undefined && !Number.isInteger(options.seed)) {
      throw new RangeError(`Noise seed must be an integer, got ${options.seed}`);
    }
    this.seed = options.seed;
  }

  createState(): NoiseState {
    const seed = this.seed === undefined ? randomSeed() : (this.seed | 0) || FALLBACK_SEED;
    return { seed };
  }

  fillSamples(state: NoiseState, buffer: Float32Array, _deltaT: number, _freq: number, amp: number): void {
    for (let i = 0; i < buffer.length; i++) {
      buffer[i] += nextNoiseSample(state) * amp;
    }
  }
}

// =============================================================================
// Factory
// =============================================================================

export type OscillatorDefinition =
  | { kind: 'sine' }
  | { kind: 'saw' }
  | { kind: 'square' }
  | { kind: 'triangle' }
  | { kind: 'harmonic'; amplitudes: readonly number[] }
  | { kind: 'noise'; seed?: number };

/**
 * Build an oscillator from a plain description (e.g. a preset)
 */
export function createOscillator(definition: OscillatorDefinition): Oscillator<unknown> {
  switch (definition.kind) {
    case 'sine':
      return new SineOscillator();
    case 'saw':
      return new SawOscillator();
    case 'square':
      return new SquareOscillator();
    case 'triangle':
      return new TriangleOscillator();
    case 'harmonic':
      return new HarmonicOscillator(definition.amplitudes);
    case 'noise':
      return new NoiseOscillator({ seed: definition.seed });
  }
}
