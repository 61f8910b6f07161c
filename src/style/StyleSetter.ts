/**
 * Style Setter
 *
 * Applies a batch of color, style variable, font and disabled overrides
 * around a layout, then unwinds them in reverse: disabled, font, style
 * variables, colors. Pops are by count, so push order within a category
 * doesn't matter.
 */

import type { Color } from "../types/color";
import type { FontInfo } from "../ui/FontRegistry";
import type { UIContext } from "../ui/UIContext";
import { Layout, type LayoutItem, type Widget } from "../ui/widgets/Widget";
import {
  type StyleColorId,
  type StyleVarId,
  type StyleVarValue,
  coerceStyleVar,
  scalar,
  vector,
} from "./types";

export class StyleSetter implements Widget {
  readonly kind = "style";
  private colors = new Map<StyleColorId, Color>();
  private styles = new Map<StyleVarId, StyleVarValue>();
  private font: FontInfo | null = null;
  private fontSize: number | null = null;
  private disabled: boolean = false;
  private layout: Layout = new Layout([]);

  setColor(id: StyleColorId, color: Color): this {
    this.colors.set(id, color);
    return this;
  }

  /**
   * Override a vector style variable.
   */
  setStyle(id: StyleVarId, x: number, y: number): this {
    this.styles.set(id, vector(x, y));
    return this;
  }

  /**
   * Override a scalar style variable. Vector slots get the value on both axes.
   */
  setStyleFloat(id: StyleVarId, value: number): this {
    this.styles.set(id, scalar(value));
    return this;
  }

  /**
   * Select a font. Replaces an earlier `setFontSize`.
   */
  setFont(font: FontInfo): this {
    this.font = font;
    this.fontSize = null;
    return this;
  }

  /**
   * Use the font selected so far (or the default one) at another size.
   * A later `setFont` replaces the resized font. The derived font is
   * requested from the registry and applies once the host has loaded it.
   */
  setFontSize(size: number): this {
    this.fontSize = size;
    return this;
  }

  setDisabled(disabled: boolean): this {
    this.disabled = disabled;
    return this;
  }

  /**
   * Set the widgets the overrides apply to.
   */
  to(...widgets: LayoutItem[]): this {
    this.layout = new Layout(widgets);
    return this;
  }

  private resolveFont(ui: UIContext): FontInfo | null {
    if (this.fontSize === null) return this.font;

    const fonts = ui.getFonts();
    const derived = (this.font ?? fonts.getDefault()).withSize(this.fontSize);
    fonts.request(derived);
    return derived;
  }

  build(ui: UIContext): void {
    if (this.layout.isEmpty()) {
      return;
    }

    for (const [id, color] of this.colors) {
      ui.pushStyleColor(id, color);
    }

    for (const [id, value] of this.styles) {
      ui.pushStyleVar(id, coerceStyleVar(id, value));
    }

    const font = this.resolveFont(ui);
    const isFontPushed = font !== null && ui.pushFont(font);

    ui.pushDisabled(this.disabled);

    try {
      this.layout.build(ui);
    } finally {
      ui.popDisabled();

      if (isFontPushed) {
        ui.popFont();
      }

      ui.popStyleVar(this.styles.size);
      ui.popStyleColor(this.colors.size);
    }
  }
}

/**
 * Start a style scope: `style().setColor("text", red).to(label("Alert"))`.
 */
export function style(): StyleSetter {
  return new StyleSetter();
}
