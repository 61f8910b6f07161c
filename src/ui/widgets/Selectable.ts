/**
 * Selectable Widget
 *
 * Full-width clickable row with a selected state.
 */

import type { UIContext } from "../UIContext";
import type { Widget } from "./Widget";

export class SelectableWidget implements Widget {
  readonly kind = "selectable";
  private label: string;
  private selected: boolean = false;
  private onClickHandler: (() => void) | null = null;

  constructor(label: string) {
    this.label = label;
  }

  setSelected(selected: boolean): this {
    this.selected = selected;
    return this;
  }

  onClick(handler: () => void): this {
    this.onClickHandler = handler;
    return this;
  }

  build(ui: UIContext): void {
    if (ui.backend.selectable(this.label, this.selected) && this.onClickHandler) {
      this.onClickHandler();
    }
  }
}

export function selectable(label: string): SelectableWidget {
  return new SelectableWidget(label);
}
