/**
 * Drawing Backend Contract
 *
 * The narrow surface the composition layer drives each frame. A backend owns
 * rasterization, windowing and input polling; the layer only pushes/pops
 * style state, moves the cursor and emits widget primitives.
 */

import type { Vec2 } from "../math/vec2";
import type { Color } from "../types/color";
import type { StyleColorId, StyleVarId, StyleVarValue } from "../style/types";
import type { FontInfo } from "../ui/FontRegistry";

/** Rectangle of the most recently built item */
export interface ItemRect {
  min: Vec2;
  max: Vec2;
}

/** Result of an input text primitive */
export interface InputTextResult {
  changed: boolean;
  value: string;
}

export interface DrawingBackend {
  /** Called when the layer begins a frame */
  newFrame?(): void;

  // Style stacks
  pushStyleColor(slot: StyleColorId, color: Color): void;
  popStyleColor(count: number): void;
  pushStyleVar(slot: StyleVarId, value: StyleVarValue): void;
  popStyleVar(count: number): void;
  pushFont(font: FontInfo): void;
  popFont(): void;
  pushDisabled(disabled: boolean): void;
  popDisabled(): void;
  pushItemWidth(width: number): void;
  popItemWidth(): void;

  // Cursor and metrics
  getCursorPos(): Vec2;
  setCursorPos(pos: Vec2): void;
  /** Move the cursor back to the end of the last item, on its line */
  sameLine(): void;
  getContentRegionAvail(): Vec2;
  getWindowPadding(): Vec2;
  getItemSpacing(): Vec2;
  getItemRect(): ItemRect;

  // Floating overlay (tooltip-like) anchored at a screen position
  beginOverlay(pos: Vec2): void;
  endOverlay(): void;

  // Primitives
  text(text: string, wrapped: boolean): void;
  /** Returns true when clicked this frame */
  button(label: string): boolean;
  /** Returns true when clicked this frame */
  selectable(label: string, selected: boolean): boolean;
  /** Returns the newly picked index, or null when unchanged */
  combo(label: string, preview: string, items: readonly string[], selected: number): number | null;
  inputText(label: string, hint: string, value: string): InputTextResult;
}
