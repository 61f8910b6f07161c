/**
 * Widget Composition
 *
 * A widget is anything that can build itself into the current frame.
 * Layouts are ordered widget sequences; insertion order is build order.
 */

import type { UIContext } from "../UIContext";

export interface Widget {
  /** Widget kind, matched against configurable lists such as the alignment bypass */
  readonly kind?: string;
  build(ui: UIContext): void;
}

/** Layout entry; nullish entries are skipped */
export type LayoutItem = Widget | null | undefined;

export class Layout implements Widget {
  readonly kind = "layout";
  private readonly items: readonly LayoutItem[];

  constructor(items: readonly LayoutItem[]) {
    this.items = items;
  }

  get length(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /**
   * Visit every non-null widget in order.
   */
  range(fn: (widget: Widget) => void): void {
    for (const item of this.items) {
      if (item == null) continue;
      fn(item);
    }
  }

  build(ui: UIContext): void {
    this.range((widget) => widget.build(ui));
  }
}

export function layout(...items: LayoutItem[]): Layout {
  return new Layout(items);
}

/**
 * Wrap a build function as a widget.
 */
export function custom(build: (ui: UIContext) => void): Widget {
  return { kind: "custom", build };
}

/** Mutable cell a widget reads from and writes back to */
export interface ValueRef<T> {
  value: T;
}

export function ref<T>(value: T): ValueRef<T> {
  return { value };
}
