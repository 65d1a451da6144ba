/**
 * Polyphonic synth engine.
 *
 * Combines one oscillator and one envelope across a bounded set of notes and
 * renders them into caller-supplied sample buffers. Device output, channel
 * interleaving and note scheduling belong to the caller.
 *
 * All methods are synchronous and expect to be called from a single thread.
 */

import { logger } from '../utils/logger';
import { DEFAULT_MAX_NOTES } from './constants';
import { validateConfig, type SynthConfig } from './config';
import type { Envelope } from './envelope';
import { heldState, type Note } from './note';
import { NoteList, type NoteId } from './note-list';
import type { Oscillator } from './oscillator';

/**
 * Validate the config and allocate note storage, logging before failing fast
 */
function createNoteList<S>(config: SynthConfig, maxNotes: number): NoteList<S> {
  try {
    validateConfig(config);
    return new NoteList<S>(maxNotes);
  } catch (err) {
    logger.synth.error('Invalid synth configuration:', err instanceof Error ? err.message : err);
    throw err;
  }
}

export class Synth<S> {
  private readonly config: SynthConfig;
  private readonly oscillator: Oscillator<S>;
  private readonly envelope: Envelope;
  private readonly notes: NoteList<S>;

  // Reused across render calls; reallocated only when the buffer length changes
  private scratch: Float32Array;

  // Envelope inputs rewritten per sample instead of allocating a NoteState each time
  private readonly holdingProbe: { kind: 'holding'; time: number } = { kind: 'holding', time: 0 };
  private readonly releasedProbe: { kind: 'released'; time: number } = { kind: 'released', time: 0 };

  constructor(
    config: SynthConfig,
    oscillator: Oscillator<S>,
    envelope: Envelope,
    maxNotes: number = DEFAULT_MAX_NOTES
  ) {
    this.notes = createNoteList<S>(config, maxNotes);
    this.config = config;
    this.oscillator = oscillator;
    this.envelope = envelope;
    this.scratch = new Float32Array(config.bufferSize);

    logger.synth.log(
      `Synth initialized: ${oscillator.kind} oscillator, ${envelope.kind} envelope, ` +
      `${maxNotes} notes at ${config.sampleRate}Hz`
    );
  }

  /**
   * Time between samples, in seconds
   */
  get deltaT(): number {
    return 1 / this.config.sampleRate;
  }

  /**
   * Get current note count (for monitoring/testing)
   */
  get activeNoteCount(): number {
    return this.notes.size;
  }

  get maxNotes(): number {
    return this.notes.capacity;
  }

  /**
   * Start a note. If the synth is at capacity the oldest note is dropped.
   *
   * @param frequency - Frequency in Hz (e.g., 440 for A4)
   * @param amplitude - Gain before the envelope, typically 0-1
   */
  startNote(frequency: number, amplitude: number): NoteId {
    const note: Note<S> = {
      frequency,
      amplitude,
      time: 0,
      held: true,
      state: this.oscillator.createState(),
    };
    return this.notes.add(note);
  }

  /**
   * Release a note. Its release phase starts now, however long it was held.
   * Unknown or already removed ids are ignored.
   */
  endNote(id: NoteId): void {
    const note = this.notes.get(id);
    if (note) {
      note.held = false;
      note.time = 0;
    }
  }

  /**
   * Release every note that is still held
   */
  releaseAll(): void {
    for (const note of this.notes.notes()) {
      if (note.held) {
        note.held = false;
        note.time = 0;
      }
    }
  }

  /**
   * Drop every note immediately, without a release phase
   */
  stopAll(): void {
    this.notes.clear();
  }

  isPlaying(id: NoteId): boolean {
    return this.notes.has(id);
  }

  /**
   * Read-only view of a live note (for monitoring/testing)
   */
  getNote(id: NoteId): Readonly<Note<S>> | undefined {
    return this.notes.get(id);
  }

  /**
   * Mix every live note into `buffer` and advance each note's time by the
   * buffer's duration. The buffer is added to, not cleared.
   */
  render(buffer: Float32Array): void {
    const deltaT = this.deltaT;
    const length = buffer.length;

    if (this.scratch.length !== length) {
      this.scratch = new Float32Array(length);
    }
    const scratch = this.scratch;

    for (const note of this.notes.notes()) {
      scratch.fill(0);
      this.oscillator.fillSamples(note.state, scratch, deltaT, note.frequency, note.amplitude);

      const probe = note.held ? this.holdingProbe : this.releasedProbe;
      for (let i = 0; i < length; i++) {
        probe.time = note.time + i * deltaT;
        buffer[i] += scratch[i] * this.envelope.sample(probe);
      }

      note.time += length * deltaT;
    }
  }

  /**
   * Remove notes whose envelope has finished. Call periodically (e.g. after
   * each render) so render cost tracks the notes that are still audible.
   *
   * @returns Number of notes removed
   */
  bookkeeping(): number {
    const removed = this.notes.filter((note) => !this.envelope.noteEnded(heldState(note)));
    if (removed > 0) {
      logger.synth.debug(`Bookkeeping removed ${removed} finished note(s), ${this.notes.size} remain`);
    }
    return removed;
  }
}
