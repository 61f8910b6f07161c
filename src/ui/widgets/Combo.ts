/**
 * Combo Widget
 *
 * Drop-down picker over a list of strings. The selection lives in a
 * caller-owned ref, so the widget itself needs no persisted state.
 */

import type { UIContext } from "../UIContext";
import type { ValueRef, Widget } from "./Widget";

export class ComboWidget implements Widget {
  readonly kind = "combo";
  private label: string;
  private items: readonly string[];
  private selected: ValueRef<number>;
  private onChangeHandler: (() => void) | null = null;

  constructor(label: string, items: readonly string[], selected: ValueRef<number>) {
    this.label = label;
    this.items = items;
    this.selected = selected;
  }

  onChange(handler: () => void): this {
    this.onChangeHandler = handler;
    return this;
  }

  build(ui: UIContext): void {
    const preview = this.items[this.selected.value] ?? "";
    const picked = ui.backend.combo(this.label, preview, this.items, this.selected.value);

    if (picked !== null && picked !== this.selected.value) {
      this.selected.value = picked;
      if (this.onChangeHandler) {
        this.onChangeHandler();
      }
    }
  }
}

export function combo(label: string, items: readonly string[], selected: ValueRef<number>): ComboWidget {
  return new ComboWidget(label, items, selected);
}
