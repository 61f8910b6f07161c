/**
 * Label Widget
 *
 * Static text, optionally wrapped and in its own font.
 */

import type { FontInfo } from "../FontRegistry";
import type { UIContext } from "../UIContext";
import type { Widget } from "./Widget";

export class LabelWidget implements Widget {
  readonly kind = "label";
  private text: string;
  private wrapped: boolean = false;
  private font: FontInfo | null = null;

  constructor(text: string) {
    this.text = text;
  }

  /** Wrap at the end of the content region */
  setWrapped(wrapped: boolean): this {
    this.wrapped = wrapped;
    return this;
  }

  setFont(font: FontInfo): this {
    this.font = font;
    return this;
  }

  build(ui: UIContext): void {
    const isFontPushed = this.font !== null && ui.pushFont(this.font);

    try {
      ui.backend.text(this.text, this.wrapped);
    } finally {
      if (isFontPushed) {
        ui.popFont();
      }
    }
  }
}

export function label(text: string): LabelWidget {
  return new LabelWidget(text);
}
