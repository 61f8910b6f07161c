/**
 * Widget Measurement
 *
 * The backend has no way to size a widget before it is built, so the
 * default measurer builds it once fully transparent and reads how far the
 * cursor moved. Backends that can measure ahead of time plug in their own
 * measurer through UIContextOptions.
 */

import type { Vec2 } from "../math/vec2";
import { scalar } from "../style/types";
import type { UIContext } from "../ui/UIContext";
import type { Widget } from "../ui/widgets/Widget";

export interface WidgetMeasurer {
  /** Rendered width of `widget`; must leave the cursor where it found it */
  measureWidth(ui: UIContext, widget: Widget): number;
}

/**
 * Dry-run measurement.
 *
 * Builds the widget invisibly, so everything a build does (callbacks,
 * state updates, scripted input) happens twice per frame for measured
 * widgets. Composite widgets report the width of their last item only.
 */
export const dryRunMeasurer: WidgetMeasurer = {
  measureWidth(ui: UIContext, widget: Widget): number {
    const start = ui.getCursorPos();

    ui.pushStyleVar("alpha", scalar(0));
    try {
      widget.build(ui);
    } finally {
      ui.popStyleVar();
    }

    ui.sameLine();
    const [spacingX] = ui.getItemSpacing();
    const width = ui.getCursorPos()[0] - start[0] - spacingX;

    ui.setCursorPos(start);
    return width;
  },
};

/**
 * Measure a widget, move the cursor to where `place` says it belongs, and
 * build it there.
 */
export function measureThenPlace(
  ui: UIContext,
  widget: Widget,
  place: (width: number, origin: Vec2) => Vec2
): void {
  const origin = ui.getCursorPos();
  const width = ui.getMeasurer().measureWidth(ui, widget);
  ui.setCursorPos(place(width, origin));
  widget.build(ui);
}
