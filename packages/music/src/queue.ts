import { PlaybackError } from './errors.js';
import type { LoopMode, QueueEntry } from './types.js';

export type RandomSource = () => number;

/**
 * Ordered list of entries plus a cursor pointing at the one being played.
 * `index` is undefined while nothing has been selected, which is how an idle
 * player with a populated history looks.
 */
export class TrackQueue {
  private entries: QueueEntry[] = [];
  private currentIndex: number | undefined;

  constructor(private readonly limit: number) {}

  public get length(): number {
    return this.entries.length;
  }

  public get index(): number | undefined {
    return this.currentIndex;
  }

  public get current(): QueueEntry | null {
    return this.currentIndex === undefined ? null : (this.entries[this.currentIndex] ?? null);
  }

  public list(): QueueEntry[] {
    return [...this.entries];
  }

  /** Entries after the cursor, or every entry when nothing is selected. */
  public upcoming(): QueueEntry[] {
    return this.currentIndex === undefined ? [...this.entries] : this.entries.slice(this.currentIndex + 1);
  }

  /** Appends all entries or none. Returns the index of the first one. */
  public append(entries: QueueEntry[]): number {
    if (this.entries.length + entries.length > this.limit) {
      throw new PlaybackError(
        'QUEUE_FULL',
        `Queue can hold ${this.limit} tracks; ${this.entries.length} queued, ${entries.length} requested`,
      );
    }
    const start = this.entries.length;
    this.entries.push(...entries);
    return start;
  }

  public select(index: number): QueueEntry {
    const entry = this.entries[index];
    if (!entry) {
      throw new PlaybackError('OUT_OF_RANGE', `No queue entry at index ${index}`);
    }
    this.currentIndex = index;
    return entry;
  }

  public clear(): void {
    this.entries = [];
    this.currentIndex = undefined;
  }

  /** Drops everything except the entry being played. */
  public retainCurrent(): void {
    const current = this.current;
    this.entries = current ? [current] : [];
    this.currentIndex = current ? 0 : undefined;
  }

  /**
   * Index to play after the current entry finishes. `manual` marks a user
   * skip, which moves on even when the current track is looping.
   */
  public nextIndex(mode: LoopMode, random: RandomSource, manual = false): number | undefined {
    const length = this.entries.length;
    if (length === 0) {
      return undefined;
    }
    const current = this.currentIndex;
    if (current === undefined) {
      return 0;
    }

    switch (mode) {
      case 'track':
        return manual ? this.following(current) : current;
      case 'none':
        return this.following(current);
      case 'queue':
        return (current + 1) % length;
      case 'random': {
        if (length === 1) {
          return current;
        }
        const pick = Math.floor(random() * (length - 1));
        return pick >= current ? pick + 1 : pick;
      }
    }
  }

  public previousIndex(): number | undefined {
    const current = this.currentIndex;
    if (current === undefined || current === 0) {
      return undefined;
    }
    return current - 1;
  }

  /** Removes the upcoming entry at a 1-based position after the cursor. */
  public removeUpcoming(position: number): QueueEntry {
    const base = this.currentIndex === undefined ? 0 : this.currentIndex + 1;
    const target = base + position - 1;
    const entry = Number.isInteger(position) && position >= 1 ? this.entries[target] : undefined;
    if (!entry) {
      throw new PlaybackError('OUT_OF_RANGE', `No upcoming track at position ${position}`);
    }
    this.entries.splice(target, 1);
    return entry;
  }

  public shuffleUpcoming(random: RandomSource): number {
    const base = this.currentIndex === undefined ? 0 : this.currentIndex + 1;
    for (let i = this.entries.length - 1; i > base; i -= 1) {
      const j = base + Math.floor(random() * (i - base + 1));
      const a = this.entries[i];
      const b = this.entries[j];
      if (a && b) {
        this.entries[i] = b;
        this.entries[j] = a;
      }
    }
    return this.entries.length - base;
  }

  public replaceCurrent(entry: QueueEntry): void {
    if (this.currentIndex === undefined) {
      return;
    }
    this.entries[this.currentIndex] = entry;
  }

  private following(current: number): number | undefined {
    return current + 1 < this.entries.length ? current + 1 : undefined;
  }
}
