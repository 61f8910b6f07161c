/**
 * Button Widget
 *
 * Clickable button. The label doubles as the backend's item identifier,
 * so use "Save##toolbar" style suffixes to tell equal captions apart.
 */

import type { UIContext } from "../UIContext";
import type { Widget } from "./Widget";

export class ButtonWidget implements Widget {
  readonly kind = "button";
  private label: string;
  private onClickHandler: (() => void) | null = null;

  constructor(label: string) {
    this.label = label;
  }

  onClick(handler: () => void): this {
    this.onClickHandler = handler;
    return this;
  }

  build(ui: UIContext): void {
    const clicked = ui.backend.button(this.label);

    if (clicked && this.onClickHandler) {
      this.onClickHandler();
    }
  }
}

export function button(label: string): ButtonWidget {
  return new ButtonWidget(label);
}
