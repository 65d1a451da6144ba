/**
 * Note List with Generation-Tagged Identities
 *
 * Stores the currently sounding notes in a fixed number of slots.
 *
 * Key features:
 * - O(1) insert, lookup, removal and oldest-first eviction
 * - Insertion order kept in a doubly-linked list threaded through slot indices
 * - Slot generations make stale ids resolve to "not found" after reuse
 * - Observable metrics for debugging
 */

import { logger } from '../utils/logger';
import type { Note } from './note';

/**
 * Handle to a note in a NoteList.
 * Valid until the note is evicted or removed.
 */
export interface NoteId {
  readonly index: number;
  readonly generation: number;
}

/** Marks the end of the list */
const NIL = -1;

/**
 * A storage slot. `note` is null while the slot is free.
 */
interface Slot<S> {
  generation: number;
  note: Note<S> | null;
  prev: number;
  next: number;
}

/**
 * List metrics for observability
 */
export interface NoteListMetrics {
  size: number;
  capacity: number;
  added: number;
  evictions: number;
  removals: number;
}

export interface NoteListOptions<S> {
  /** Called when the oldest note is pushed out by a new one */
  onEvict?: (id: NoteId, note: Note<S>) => void;
}

/**
 * Fixed-capacity, insertion-ordered note storage.
 *
 * Usage:
 * ```typescript
 * const notes = new NoteList<PhaseState>(8);
 *
 * const id = notes.add(note);   // evicts the oldest note when full
 * const live = notes.get(id);   // undefined once evicted or removed
 * if (live) live.held = false;  // mutate in place
 * notes.remove(id);             // no-op if already gone
 * ```
 */
export class NoteList<S> {
  private readonly slots: Slot<S>[];
  private readonly freeSlots: number[];
  private head = NIL;
  private tail = NIL;
  private count = 0;
  private readonly onEvict?: (id: NoteId, note: Note<S>) => void;

  // Metrics
  private added = 0;
  private evictions = 0;
  private removals = 0;

  constructor(readonly capacity: number, options: NoteListOptions<S> = {}) {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new RangeError(`NoteList capacity must be a positive integer, got ${capacity}`);
    }

    this.slots = new Array<Slot<S>>(capacity);
    this.freeSlots = new Array<number>(capacity);
    for (let i = 0; i < capacity; i++) {
      this.slots[i] = { generation: 0, note: null, prev: NIL, next: NIL };
      // Pop order hands out slot 0 first
      this.freeSlots[i] = capacity - 1 - i;
    }
    this.onEvict = options.onEvict;
  }

  /**
   * Number of live notes
   */
  get size(): number {
    return this.count;
  }

  /**
   * Insert a note as the newest entry, evicting the oldest one if the list is full
   */
  add(note: Note<S>): NoteId {
    if (this.count === this.capacity) {
      this.evictOldest();
    }

    const index = this.freeSlots.pop();
    if (index === undefined) {
      // Unreachable while count and freeSlots agree
      throw new Error('NoteList has no free slot after eviction');
    }

    const slot = this.slots[index];
    slot.note = note;
    slot.prev = this.tail;
    slot.next = NIL;

    if (this.tail !== NIL) {
      this.slots[this.tail].next = index;
    } else {
      this.head = index;
    }
    this.tail = index;

    this.count++;
    this.added++;
    return { index, generation: slot.generation };
  }

  /**
   * Get the live note for an id, or undefined if it was evicted or removed
   */
  get(id: NoteId): Note<S> | undefined {
    const slot = this.liveSlot(id);
    return slot?.note ?? undefined;
  }

  has(id: NoteId): boolean {
    return this.liveSlot(id) !== undefined;
  }

  /**
   * Remove a note. Returns false if the id was already gone.
   */
  remove(id: NoteId): boolean {
    const slot = this.liveSlot(id);
    if (!slot) return false;

    this.release(id.index);
    this.removals++;
    return true;
  }

  /**
   * Keep only the notes for which `keep` returns true, visiting oldest first.
   * The successor is read before `keep` runs, so removing the current note
   * never disturbs the walk.
   */
  filter(keep: (note: Note<S>) => boolean): number {
    let removed = 0;
    let index = this.head;

    while (index !== NIL) {
      const slot = this.slots[index];
      const next = slot.next;
      if (slot.note && !keep(slot.note)) {
        this.release(index);
        this.removals++;
        removed++;
      }
      index = next;
    }

    return removed;
  }

  /**
   * Iterate every live note, oldest first. Notes may be mutated in place;
   * adding or removing notes while iterating is not supported.
   */
  *notes(): IterableIterator<Note<S>> {
    for (let index = this.head; index !== NIL; index = this.slots[index].next) {
      const note = this.slots[index].note;
      if (note) yield note;
    }
  }

  [Symbol.iterator](): IterableIterator<Note<S>> {
    return this.notes();
  }

  /**
   * Ids of live notes, oldest first (for debugging and tests)
   */
  ids(): NoteId[] {
    const result: NoteId[] = [];
    for (let index = this.head; index !== NIL; index = this.slots[index].next) {
      result.push({ index, generation: this.slots[index].generation });
    }
    return result;
  }

  /**
   * Id of the note that would be evicted next
   */
  oldest(): NoteId | undefined {
    if (this.head === NIL) return undefined;
    return { index: this.head, generation: this.slots[this.head].generation };
  }

  /**
   * Remove every note. Ids issued before the call stop resolving.
   */
  clear(): void {
    while (this.head !== NIL) {
      this.release(this.head);
      this.removals++;
    }
  }

  /**
   * Get current list metrics
   */
  getMetrics(): NoteListMetrics {
    return {
      size: this.count,
      capacity: this.capacity,
      added: this.added,
      evictions: this.evictions,
      removals: this.removals,
    };
  }

  // === Private Methods ===

  private liveSlot(id: NoteId): Slot<S> | undefined {
    if (!Number.isInteger(id.index) || id.index < 0 || id.index >= this.capacity) {
      return undefined;
    }
    const slot = this.slots[id.index];
    if (slot.note === null || slot.generation !== id.generation) {
      return undefined;
    }
    return slot;
  }

  private evictOldest(): void {
    const index = this.head;
    const slot = this.slots[index];
    const note = slot.note;
    const id: NoteId = { index, generation: slot.generation };

    this.release(index);
    this.evictions++;

    if (note && this.onEvict) {
      this.onEvict(id, note);
    }
    logger.notes.debug(`Evicted oldest note (${note?.frequency ?? '?'}Hz) at capacity ${this.capacity}`);
  }

  /**
   * Unlink a slot, free it and bump its generation so old ids stop matching
   */
  private release(index: number): void {
    const slot = this.slots[index];

    if (slot.prev !== NIL) {
      this.slots[slot.prev].next = slot.next;
    } else {
      this.head = slot.next;
    }

    if (slot.next !== NIL) {
      this.slots[slot.next].prev = slot.prev;
    } else {
      this.tail = slot.prev;
    }

    slot.note = null;
    slot.prev = NIL;
    slot.next = NIL;
    slot.generation++;

    this.freeSlots.push(index);
    this.count--;
  }
}
