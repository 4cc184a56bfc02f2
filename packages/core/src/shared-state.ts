/**
 * Shared state store
 *
 * One cell per source holding its latest accepted value. Each cell has a
 * single writer (the source's producer loop) and any number of readers.
 *
 * Cell operations are synchronous, so a write is one reference replace that
 * no other task can interleave with: readers see either the old or the new
 * value, never a partial one. Snapshots are consistent per cell, not across
 * cells.
 */

import type { Snapshot, SourceValues } from "./types";

/** Write handle for one cell, held by that source's producer */
export interface CellWriter<T> {
  get(): T | undefined;
  set(value: T): void;
}

export class StateCell<T> {
  private value: T | undefined;
  private claimed = false;

  get(): T | undefined {
    return this.value;
  }

  claim(): CellWriter<T> {
    if (this.claimed) {
      throw new Error("Cell already has a writer");
    }
    this.claimed = true;
    return {
      get: () => this.value,
      set: (value) => {
        Object.freeze(value);
        this.value = value;
      },
    };
  }
}

export type StateCells<V> = { [K in keyof V]: StateCell<V[K]> };

export class SharedStateStore<V extends object = SourceValues> {
  constructor(
    private readonly cells: StateCells<V>,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Latest accepted value for a source, or undefined before the first write
   */
  get<K extends keyof V>(source: K): V[K] | undefined {
    return this.cells[source].get();
  }

  /**
   * Take the single write handle for a source.
   * Throws if the source already has a writer.
   */
  claimWriter<K extends keyof V>(source: K): CellWriter<V[K]> {
    return this.cells[source].claim();
  }

  /**
   * Frozen copy of every cell's current value
   */
  snapshot(): Snapshot<V> {
    const values: Partial<V> = {};
    for (const source in this.cells) {
      this.copyInto(values, source);
    }
    const snapshot: Partial<V> & { takenAt: number } = {
      ...values,
      takenAt: this.now(),
    };
    Object.freeze(snapshot);
    return snapshot;
  }

  private copyInto<K extends keyof V>(values: Partial<V>, source: K): void {
    const value = this.cells[source].get();
    if (value !== undefined) {
      values[source] = value;
    }
  }
}

/**
 * Store with one cell per board source
 */
export function createSourceStore(
  now: () => number = Date.now
): SharedStateStore<SourceValues> {
  return new SharedStateStore<SourceValues>(
    { trips: new StateCell(), weather: new StateCell() },
    now
  );
}
