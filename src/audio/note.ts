/**
 * A single sounding note and its position in the held/released lifecycle.
 */

export interface Note<S> {
  /** Frequency in Hz */
  frequency: number;
  /** Gain applied before the envelope */
  amplitude: number;
  /** Seconds since the note started or was released, depending on `held` */
  time: number;
  /** Whether the note is still being held */
  held: boolean;
  /** Oscillator state, owned by this note alone */
  state: S;
}

export type NoteState =
  | { kind: 'holding'; time: number }
  | { kind: 'released'; time: number };

export function holding(time: number): NoteState {
  return { kind: 'holding', time };
}

export function released(time: number): NoteState {
  return { kind: 'released', time };
}

/**
 * Envelope input for a note, `offset` seconds past its current time.
 */
export function heldState<S>(note: Note<S>, offset: number = 0): NoteState {
  return note.held ? holding(note.time + offset) : released(note.time + offset);
}
