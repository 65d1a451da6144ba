/**
 * Tests for the polyphonic synth
 *
 * Rendering runs at low sample rates (4Hz, 1000Hz) so that sample times and
 * envelope positions are easy to read off.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Synth } from './synth';
import { createConfig } from './config';
import { AdsrEnvelope } from './envelope';
import { SineOscillator, SquareOscillator, type PhaseState } from './oscillator';

const PARAMS = { attack: 0.01, decay: 0.01, sustain: 0.5, release: 0.1 };

/** 1ms per sample */
const MS_CONFIG = createConfig({ sampleRate: 1000, bufferSize: 10, leftoverSampleCount: 0 });

function createSineSynth(maxNotes = 4): Synth<PhaseState> {
  return new Synth(MS_CONFIG, new SineOscillator(), new AdsrEnvelope(PARAMS), maxNotes);
}

describe('Synth', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('exposes timing and capacity', () => {
      const synth = createSineSynth(8);

      expect(synth.deltaT).toBe(0.001);
      expect(synth.maxNotes).toBe(8);
      expect(synth.activeNoteCount).toBe(0);
    });

    it('logs and rethrows an invalid configuration', () => {
      const error = vi.spyOn(console, 'error').mockImplementation(() => {});
      const config = { sampleRate: 0, bufferSize: 10, leftoverSampleCount: 0 };

      expect(() => new Synth(config, new SineOscillator(), AdsrEnvelope.immediate())).toThrow(RangeError);
      expect(error).toHaveBeenCalledWith(
        '[Synth] Invalid synth configuration:',
        'sampleRate must be a positive number, got 0'
      );
    });

    it('rejects zero polyphony', () => {
      vi.spyOn(console, 'error').mockImplementation(() => {});

      expect(() => createSineSynth(0)).toThrow(RangeError);
    });
  });

  describe('render', () => {
    it('applies the attack ramp to a sine note', () => {
      const synth = createSineSynth();
      synth.startNote(440, 1);
      const buffer = new Float32Array(10);

      synth.render(buffer);

      expect(buffer[0]).toBe(0);
      for (let i = 1; i < 10; i++) {
        // Attack is 10ms, so sample i is at i/10 of full amplitude
        const expected = (i / 10) * Math.sin(2 * Math.PI * 440 * i * 0.001);
        expect(buffer[i]).toBeCloseTo(expected, 5);
      }
    });

    it('advances note time by the buffer duration', () => {
      const synth = createSineSynth();
      const id = synth.startNote(440, 1);

      synth.render(new Float32Array(10));
      synth.render(new Float32Array(5));

      expect(synth.getNote(id)?.time).toBeCloseTo(0.015, 12);
    });

    it('adds to the buffer and scales by amplitude', () => {
      const config = createConfig({ sampleRate: 4, bufferSize: 4, leftoverSampleCount: 0 });
      const synth = new Synth(config, new SquareOscillator(), AdsrEnvelope.immediate());
      synth.startNote(1, 0.5);
      const buffer = Float32Array.from([1, 1, 1, 1]);

      synth.render(buffer);

      expect(Array.from(buffer)).toEqual([1.5, 1.5, 0.5, 0.5]);
    });

    it('leaves the buffer untouched with no notes', () => {
      const buffer = Float32Array.from([0.25, -0.25]);

      createSineSynth().render(buffer);

      expect(Array.from(buffer)).toEqual([0.25, -0.25]);
    });

    it('mixes notes as the sum of each note alone', () => {
      const both = createSineSynth();
      both.startNote(440, 0.5);
      both.startNote(660, 0.25);
      const low = createSineSynth();
      low.startNote(440, 0.5);
      const high = createSineSynth();
      high.startNote(660, 0.25);

      const mixed = new Float32Array(64);
      const lowOnly = new Float32Array(64);
      const highOnly = new Float32Array(64);
      both.render(mixed);
      low.render(lowOnly);
      high.render(highOnly);

      for (let i = 0; i < 64; i++) {
        expect(mixed[i]).toBeCloseTo(lowOnly[i] + highOnly[i], 5);
      }
    });

    it('handles buffers of any length', () => {
      const synth = createSineSynth();
      const id = synth.startNote(440, 1);

      synth.render(new Float32Array(0));
      expect(synth.getNote(id)?.time).toBe(0);

      synth.render(new Float32Array(500));
      expect(synth.getNote(id)?.time).toBeCloseTo(0.5, 12);
    });
  });

  describe('startNote', () => {
    it('drops the oldest note at capacity', () => {
      const synth = createSineSynth(2);
      const a = synth.startNote(220, 1);
      const b = synth.startNote(330, 1);
      const c = synth.startNote(440, 1);

      expect(synth.isPlaying(a)).toBe(false);
      expect(synth.isPlaying(b)).toBe(true);
      expect(synth.isPlaying(c)).toBe(true);
      expect(synth.activeNoteCount).toBe(2);
    });

    it('starts held at time zero', () => {
      const synth = createSineSynth();
      const id = synth.startNote(440, 0.8);

      expect(synth.getNote(id)).toEqual({
        frequency: 440,
        amplitude: 0.8,
        time: 0,
        held: true,
        state: { phase: 0 },
      });
    });
  });

  describe('endNote', () => {
    it('releases the note and restarts its clock', () => {
      const synth = createSineSynth();
      const id = synth.startNote(440, 1);
      synth.render(new Float32Array(30));

      synth.endNote(id);

      expect(synth.getNote(id)?.held).toBe(false);
      expect(synth.getNote(id)?.time).toBe(0);
    });

    it('ignores an id whose note was evicted', () => {
      const synth = createSineSynth(1);
      const a = synth.startNote(220, 1);
      const b = synth.startNote(330, 1);

      synth.endNote(a);

      expect(synth.getNote(b)?.held).toBe(true);
    });

    it('silences the note once the release has passed', () => {
      const synth = createSineSynth();
      const id = synth.startNote(440, 1);
      synth.endNote(id);
      const buffer = new Float32Array(150);

      synth.render(buffer);

      expect(Array.from(buffer.subarray(101)).every((v) => v === 0)).toBe(true);
    });
  });

  describe('bookkeeping', () => {
    it('keeps held notes however long they play', () => {
      const synth = createSineSynth();
      synth.startNote(440, 1);
      synth.render(new Float32Array(1000));

      expect(synth.bookkeeping()).toBe(0);
      expect(synth.activeNoteCount).toBe(1);
    });

    it('removes a released note only after its release time', () => {
      const synth = createSineSynth();
      const id = synth.startNote(440, 1);
      synth.endNote(id);

      synth.render(new Float32Array(50));
      expect(synth.bookkeeping()).toBe(0);

      synth.render(new Float32Array(100));
      expect(synth.bookkeeping()).toBe(1);
      expect(synth.isPlaying(id)).toBe(false);
      expect(synth.activeNoteCount).toBe(0);
    });
  });

  describe('releaseAll and stopAll', () => {
    it('releaseAll lets every note ring out', () => {
      const synth = createSineSynth();
      const a = synth.startNote(220, 1);
      const b = synth.startNote(330, 1);

      synth.releaseAll();

      expect(synth.getNote(a)?.held).toBe(false);
      expect(synth.getNote(b)?.held).toBe(false);
      synth.render(new Float32Array(150));
      expect(synth.bookkeeping()).toBe(2);
    });

    it('releaseAll does not restart notes already released', () => {
      const synth = createSineSynth();
      const id = synth.startNote(220, 1);
      synth.endNote(id);
      synth.render(new Float32Array(40));

      synth.releaseAll();

      expect(synth.getNote(id)?.time).toBeCloseTo(0.04, 12);
    });

    it('stopAll drops every note at once', () => {
      const synth = createSineSynth();
      const id = synth.startNote(220, 1);
      synth.startNote(330, 1);

      synth.stopAll();

      expect(synth.activeNoteCount).toBe(0);
      expect(synth.isPlaying(id)).toBe(false);
    });
  });
});
