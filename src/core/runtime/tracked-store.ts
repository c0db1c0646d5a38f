/**
 * Journaled state stores.
 *
 * Every write pushes an undo step into the active operation frame, so a
 * failed operation can be replayed backwards across every ledger at once.
 * Dirty keys are kept until the next persistence flush.
 */

export interface Journal {
  /** Record how to undo a write that just happened */
  record(undo: () => void): void;
}

export class TrackedMap<K, V extends NonNullable<unknown>> {
  private readonly entries = new Map<K, V>();
  private readonly dirty = new Set<K>();

  constructor(private readonly journal: Journal) {}

  get(key: K): V | undefined {
    return this.entries.get(key);
  }

  has(key: K): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  values(): IterableIterator<V> {
    return this.entries.values();
  }

  set(key: K, value: V): void {
    const previous = this.entries.get(key);
    this.entries.set(key, value);
    this.dirty.add(key);
    this.journal.record(() => {
      if (previous === undefined) {
        this.entries.delete(key);
      } else {
        this.entries.set(key, previous);
      }
    });
  }

  /** Load persisted state. Not journaled, not dirty. */
  hydrate(key: K, value: V): void {
    this.entries.set(key, value);
  }

  /** Return and clear the keys written since the last drain */
  drainDirty(): Array<[K, V]> {
    const out: Array<[K, V]> = [];
    for (const key of this.dirty) {
      const value = this.entries.get(key);
      if (value !== undefined) {
        out.push([key, value]);
      }
    }
    this.dirty.clear();
    return out;
  }
}

export class TrackedCell<V extends NonNullable<unknown>> {
  private dirty = false;

  constructor(
    private readonly journal: Journal,
    private value: V
  ) {}

  get(): V {
    return this.value;
  }

  set(next: V): void {
    const previous = this.value;
    this.value = next;
    this.dirty = true;
    this.journal.record(() => {
      this.value = previous;
    });
  }

  hydrate(value: V): void {
    this.value = value;
  }

  drainDirty(): V | null {
    if (!this.dirty) return null;
    this.dirty = false;
    return this.value;
  }
}
