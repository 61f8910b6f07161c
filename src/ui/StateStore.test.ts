import { describe, it, expect, vi } from "vitest";
import { StateStore, type Disposable } from "./StateStore";
import { UIInvariantError } from "./errors";

class CounterState implements Disposable {
  count = 0;
  dispose = vi.fn();
}

class FlagState implements Disposable {
  on = false;
  dispose = vi.fn();
}

describe("StateStore", () => {
  describe("getOrCreate", () => {
    it("creates an entry on first use and reuses it afterwards", () => {
      const store = new StateStore();
      const create = vi.fn(() => new CounterState());

      const first = store.getOrCreate("counter##1", CounterState, create);
      first.count = 3;
      const second = store.getOrCreate("counter##1", CounterState, create);

      expect(second).toBe(first);
      expect(second.count).toBe(3);
      expect(create).toHaveBeenCalledTimes(1);
      expect(store.size).toBe(1);
    });

    it("keeps entries under different identifiers apart", () => {
      const store = new StateStore();

      const a = store.getOrCreate("a", CounterState, () => new CounterState());
      const b = store.getOrCreate("b", CounterState, () => new CounterState());

      expect(a).not.toBe(b);
      expect(store.size).toBe(2);
    });
  });

  describe("get and set", () => {
    it("returns what was set", () => {
      const store = new StateStore();
      const state = new CounterState();
      store.set("counter", state);

      expect(store.get("counter")).toBe(state);
      expect(store.has("counter")).toBe(true);
    });

    it("returns undefined for an identifier never set", () => {
      const store = new StateStore();

      expect(store.get("missing")).toBeUndefined();
      expect(store.has("missing")).toBe(false);
    });
  });

  describe("getAs", () => {
    it("returns undefined for a missing entry", () => {
      const store = new StateStore();
      expect(store.getAs("missing", CounterState)).toBeUndefined();
    });

    it("throws when the entry belongs to another class", () => {
      const store = new StateStore();
      store.set("shared", new FlagState());

      expect(() => store.getAs("shared", CounterState)).toThrow(UIInvariantError);
      expect(() => store.getAs("shared", CounterState)).toThrow(
        'StateStore.getAs: wrong state type recovered for "shared" (expected CounterState, got FlagState)'
      );
    });

    it("does not replace a mistyped entry through getOrCreate", () => {
      const store = new StateStore();
      const flag = new FlagState();
      store.set("shared", flag);

      expect(() => store.getOrCreate("shared", CounterState, () => new CounterState())).toThrow(UIInvariantError);
      expect(store.get("shared")).toBe(flag);
    });
  });

  describe("dispose", () => {
    it("removes the entry and runs its hook", () => {
      const store = new StateStore();
      const state = store.getOrCreate("x", CounterState, () => new CounterState());

      store.dispose("x");

      expect(store.has("x")).toBe(false);
      expect(state.dispose).toHaveBeenCalledTimes(1);
    });

    it("ignores unknown identifiers", () => {
      const store = new StateStore();
      expect(() => store.dispose("nope")).not.toThrow();
    });

    it("disposeAll empties the store", () => {
      const store = new StateStore();
      const a = store.getOrCreate("a", CounterState, () => new CounterState());
      const b = store.getOrCreate("b", FlagState, () => new FlagState());

      store.disposeAll();

      expect(store.size).toBe(0);
      expect(a.dispose).toHaveBeenCalledTimes(1);
      expect(b.dispose).toHaveBeenCalledTimes(1);
    });
  });
});
