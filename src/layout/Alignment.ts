/**
 * Alignment
 *
 * Places each widget of a layout horizontally within the available content
 * region: left, centered, or right-aligned.
 */

import type { Vec2 } from "../math/vec2";
import { UIInvariantError } from "../ui/errors";
import type { UIContext } from "../ui/UIContext";
import { Layout, type LayoutItem, type Widget } from "../ui/widgets/Widget";
import { measureThenPlace } from "./measure";

export type AlignmentType = "left" | "center" | "right";

/**
 * Compute the aligned cursor position for a widget of `width`.
 *
 * `available` is the full row width including both horizontal window
 * paddings, since cursor positions are window-relative.
 */
export function alignedPosition(
  type: AlignmentType,
  width: number,
  available: number,
  origin: Vec2
): Vec2 {
  switch (type) {
    case "left":
      return [origin[0], origin[1]];
    case "center":
      return [available / 2 - width / 2, origin[1]];
    case "right":
      return [available - width, origin[1]];
    default: {
      const unknown: never = type;
      throw new UIInvariantError("AlignmentSetter.build", `unknown align type ${String(unknown)}`);
    }
  }
}

export class AlignmentSetter implements Widget {
  readonly kind = "align";
  private alignType: AlignmentType;
  private layout: Layout = new Layout([]);

  constructor(alignType: AlignmentType) {
    this.alignType = alignType;
  }

  /**
   * Set the widgets this alignment applies to.
   */
  to(...widgets: LayoutItem[]): this {
    this.layout = new Layout(widgets);
    return this;
  }

  build(ui: UIContext): void {
    const bypass = ui.getConfig().alignment.bypassKinds;

    this.layout.range((widget) => {
      // Already aligned by its own setter
      if (widget instanceof AlignmentSetter) {
        widget.build(ui);
        return;
      }

      if (widget.kind !== undefined && bypass.includes(widget.kind)) {
        widget.build(ui);
        return;
      }

      measureThenPlace(ui, widget, (width, origin) => {
        const [paddingX] = ui.getWindowPadding();
        const available = ui.getContentRegionAvail()[0] + 2 * paddingX;
        return alignedPosition(this.alignType, width, available, origin);
      });
    });
  }
}

/**
 * Align widgets: `align("center").to(label("Title"), button("OK"))`.
 */
export function align(type: AlignmentType): AlignmentSetter {
  return new AlignmentSetter(type);
}
