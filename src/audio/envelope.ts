/**
 * Envelopes
 *
 * An envelope maps a note's NoteState to an amplitude multiplier in [0, 1].
 * Envelopes are stateless: the only per-note input is the note's own time.
 *
 * ```plaintext
 * amplitude
 * ^
 * |     /|\
 * |    / | \
 * |   /  |  +---------------+\ -  -  -  -  -  -  -  +
 * |  /   |  |               | \                     | Sustain
 * +-+----+--+---------------+--+------> time  -  -  +
 *   |    |  |               +--+ Release
 *   |    |  |               (note is released)
 *   |    +--+ Decay
 * t=0----+ Attack
 * ```
 */

import type { NoteState } from './note';
import { clamp, isValidNumber } from '../utils/math';

export type EnvelopeKind = 'linear' | 'exponential';

export interface Envelope {
  readonly kind: EnvelopeKind;

  /** Amplitude in [0, 1] for the given state */
  sample(state: NoteState): number;

  /** Whether a note in this state will not make any more sound */
  noteEnded(state: NoteState): boolean;
}

/** All times are in seconds */
export interface AdsrParams {
  /** Time to reach full amplitude */
  attack: number;
  /** Time to fall from full amplitude to the sustain level */
  decay: number;
  /** Amplitude while the note is held after the decay, 0-1 */
  sustain: number;
  /** Time to reach 0 after the note is released */
  release: number;
}

function validateAdsr(params: AdsrParams): void {
  for (const key of ['attack', 'decay', 'release'] as const) {
    if (!isValidNumber(params[key], 0, Infinity)) {
      throw new RangeError(`Envelope ${key} must be a finite number >= 0, got ${params[key]}`);
    }
  }
  if (!isValidNumber(params.sustain, 0, 1)) {
    throw new RangeError(`Envelope sustain must be between 0 and 1, got ${params.sustain}`);
  }
}

/**
 * ADSR envelope with straight-line ramps.
 *
 * The release ramp runs from 1.0 down to 0, not from the sustain level.
 */
export class AdsrEnvelope implements Envelope {
  readonly kind: EnvelopeKind = 'linear';
  readonly attack: number;
  readonly decay: number;
  readonly sustain: number;
  readonly release: number;

  constructor(params: AdsrParams) {
    validateAdsr(params);
    this.attack = params.attack;
    this.decay = params.decay;
    this.sustain = params.sustain;
    this.release = params.release;
  }

  /**
   * Full amplitude from the first sample, silent as soon as released
   */
  static immediate(): AdsrEnvelope {
    return new AdsrEnvelope({ attack: 0, decay: 0, sustain: 1, release: 0 });
  }

  sample(state: NoteState): number {
    if (state.kind === 'holding') {
      const time = state.time;
      if (time < 0) {
        return 0;
      } else if (time < this.attack) {
        return time / this.attack;
      } else if (time < this.attack + this.decay) {
        const decayTime = time - this.attack;
        return 1 + (this.sustain - 1) * clamp(decayTime / this.decay, 0, 1);
      }
      return this.sustain;
    }

    const time = Math.max(0, state.time);
    if (time < this.release) {
      return 1 - time / this.release;
    }
    return 0;
  }

  noteEnded(state: NoteState): boolean {
    return state.kind === 'released' && state.time >= this.release;
  }
}

/**
 * Sample the inverse exponential `y = a * e^(-x) + c` that passes through
 * (0, yStart) and (xEnd, yEnd), at normalized progress `t` in [0, 1].
 * Larger `xEnd` gives a sharper curve.
 */
export function sampleExp(yStart: number, yEnd: number, xEnd: number, t: number): number {
  const a = (yStart - yEnd) / (1 - Math.exp(-xEnd));
  const c = yStart - a;
  return a * Math.exp(-t * xEnd) + c;
}

export const DEFAULT_EXP_END_X = 4;

/**
 * ADSR envelope whose ramps follow an inverse exponential, for analog-style
 * curves. The release ramp runs from the sustain level down to 0.
 */
export class ExponentialAdsrEnvelope implements Envelope {
  readonly kind: EnvelopeKind = 'exponential';
  /** The ending x value of the exponential function */
  readonly endX: number;
  readonly props: AdsrEnvelope;

  constructor(params: AdsrParams, endX: number = DEFAULT_EXP_END_X) {
    if (!Number.isFinite(endX) || endX <= 0) {
      throw new RangeError(`Exponential envelope endX must be a finite number > 0, got ${endX}`);
    }
    this.endX = endX;
    this.props = new AdsrEnvelope(params);
  }

  sample(state: NoteState): number {
    // Rounding in exp() can overshoot the ramp ends by an ulp
    return clamp(this.sampleCurve(state), 0, 1);
  }

  private sampleCurve(state: NoteState): number {
    const { attack, decay, sustain, release } = this.props;

    if (state.kind === 'holding') {
      const time = state.time;
      if (time < 0) {
        return 0;
      } else if (time < attack) {
        return sampleExp(0, 1, this.endX, time / attack);
      } else if (time < attack + decay) {
        return sampleExp(1, sustain, this.endX, (time - attack) / decay);
      }
      return sustain;
    }

    const time = Math.max(0, state.time);
    if (time < release) {
      return sampleExp(sustain, 0, this.endX, time / release);
    }
    return 0;
  }

  noteEnded(state: NoteState): boolean {
    return this.props.noteEnded(state);
  }
}

// =============================================================================
// Factory
// =============================================================================

export type EnvelopeDefinition =
  | ({ kind: 'linear' } & AdsrParams)
  | ({ kind: 'exponential'; endX?: number } & AdsrParams);

/**
 * Build an envelope from a plain description (e.g. a preset)
 */
export function createEnvelope(definition: EnvelopeDefinition): Envelope {
  const { attack, decay, sustain, release } = definition;
  switch (definition.kind) {
    case 'linear':
      return new AdsrEnvelope({ attack, decay, sustain, release });
    case 'exponential':
      return new ExponentialAdsrEnvelope({ attack, decay, sustain, release }, definition.endX);
  }
}
