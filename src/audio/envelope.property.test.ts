/**
 * Property-Based Tests for envelopes
 *
 * Covers ramp monotonicity, the release boundary and the [0, 1] output range
 * for arbitrary ADSR settings, including zero-length phases.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { AdsrEnvelope, ExponentialAdsrEnvelope, type AdsrParams, type Envelope } from './envelope';
import { holding, released } from './note';
import {
  arbAdsrParams,
  arbEndX,
  arbPhaseDuration,
  arbSustain,
  arbTime,
} from '../test/arbitraries';

const STEPS = 64;

/** Linear or exponential envelope, with the params it was built from */
const arbEnvelope: fc.Arbitrary<{ env: Envelope; params: AdsrParams }> = fc
  .tuple(arbAdsrParams, fc.option(arbEndX))
  .map(([params, endX]) => ({
    params,
    env: endX === null ? new AdsrEnvelope(params) : new ExponentialAdsrEnvelope(params, endX),
  }));

describe('Envelope properties', () => {
  it('linear attack is non-decreasing and approaches 1', () => {
    fc.assert(
      fc.property(arbPhaseDuration, arbSustain, (attack, sustain) => {
        const env = new AdsrEnvelope({ attack, decay: 0.1, sustain, release: 0.1 });
        let previous = -Infinity;

        for (let i = 0; i < STEPS; i++) {
          const value = env.sample(holding((attack * i) / STEPS));
          expect(value).toBeGreaterThanOrEqual(previous);
          previous = value;
        }
        expect(previous).toBeCloseTo((STEPS - 1) / STEPS, 9);
      })
    );
  });

  it('linear release is non-increasing and reaches 0 at the release time', () => {
    fc.assert(
      fc.property(arbPhaseDuration, arbSustain, (release, sustain) => {
        const env = new AdsrEnvelope({ attack: 0.01, decay: 0.1, sustain, release });
        let previous = Infinity;

        for (let i = 0; i <= STEPS; i++) {
          const value = env.sample(released((release * i) / STEPS));
          expect(value).toBeLessThanOrEqual(previous);
          previous = value;
        }
        expect(env.sample(released(release))).toBe(0);
      })
    );
  });

  it('noteEnded flips exactly at the release time', () => {
    fc.assert(
      fc.property(arbEnvelope, arbTime, ({ env, params }, time) => {
        expect(env.noteEnded(released(time))).toBe(time >= params.release);
        expect(env.noteEnded(holding(time))).toBe(false);
      })
    );
  });

  it('always samples within [0, 1]', () => {
    fc.assert(
      fc.property(arbEnvelope, arbTime, fc.boolean(), ({ env }, time, isHeld) => {
        const value = env.sample(isHeld ? holding(time) : released(time));

        expect(Number.isFinite(value)).toBe(true);
        expect(value).toBeGreaterThanOrEqual(0);
        expect(value).toBeLessThanOrEqual(1);
      })
    );
  });
});
