/**
 * State Store
 *
 * Cross-frame memory for widgets that are rebuilt every frame.
 * Entries are keyed by widget identifier and created lazily on first build.
 * Nothing is evicted automatically: an entry outlives the frames in which its
 * widget stops being built until `dispose` or `disposeAll` is called.
 *
 * Single-threaded: only the code running the build pass may touch it.
 */

import { UIInvariantError } from "./errors";

export type WidgetId = string;

/** Persisted widget state. `dispose` runs when the entry is evicted. */
export interface Disposable {
  dispose(): void;
}

/** Class of a state value, used to check recovered entries */
export type StateClass<T extends Disposable> = new (...args: never[]) => T;

export class StateStore {
  private entries = new Map<WidgetId, Disposable>();

  get(id: WidgetId): Disposable | undefined {
    return this.entries.get(id);
  }

  set(id: WidgetId, state: Disposable): void {
    this.entries.set(id, state);
  }

  has(id: WidgetId): boolean {
    return this.entries.has(id);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Recover a state entry as a specific class.
   * Throws if the entry exists but belongs to another widget kind.
   */
  getAs<T extends Disposable>(id: WidgetId, type: StateClass<T>): T | undefined {
    const value = this.entries.get(id);
    if (value === undefined) return undefined;

    if (!(value instanceof type)) {
      throw new UIInvariantError(
        "StateStore.getAs",
        `wrong state type recovered for "${id}" (expected ${type.name}, got ${value.constructor.name})`
      );
    }

    return value;
  }

  /**
   * Recover a state entry, creating and storing it on first use.
   */
  getOrCreate<T extends Disposable>(id: WidgetId, type: StateClass<T>, create: () => T): T {
    const existing = this.getAs(id, type);
    if (existing !== undefined) return existing;

    const state = create();
    this.entries.set(id, state);
    return state;
  }

  /**
   * Evict one entry, running its disposal hook.
   */
  dispose(id: WidgetId): void {
    const value = this.entries.get(id);
    if (value === undefined) return;

    this.entries.delete(id);
    value.dispose();
  }

  /**
   * Evict every entry.
   */
  disposeAll(): void {
    const values = [...this.entries.values()];
    this.entries.clear();
    for (const value of values) {
      value.dispose();
    }
  }
}
