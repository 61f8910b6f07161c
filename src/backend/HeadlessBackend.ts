/**
 * Headless Backend
 *
 * In-process drawing backend that lays items out the way a typical
 * immediate mode backend does (top-to-bottom rows, item spacing, same-line
 * placement) and records what would have been drawn. Used by tests and for
 * checking layouts without a window.
 *
 * Glyphs are fixed-width: half the font size per character.
 */

import { add, clone, type Vec2 } from "../math/vec2";
import type { Color } from "../types/color";
import type { StyleColorId, StyleVarId, StyleVarValue } from "../style/types";
import type { FontInfo } from "../ui/FontRegistry";
import type { DrawingBackend, InputTextResult, ItemRect } from "./types";

export type DrawCommandKind = "text" | "button" | "selectable" | "combo" | "inputText";

/** Recorded primitive */
export interface DrawCommand {
  kind: DrawCommandKind;
  /** Displayed text (label without its ## suffix, or the input value) */
  text: string;
  rect: ItemRect;
  alpha: number;
  disabled: boolean;
  font: string;
  /** Overlay nesting depth; 0 for the window itself */
  overlay: number;
}

export interface HeadlessBackendOptions {
  windowSize?: Vec2;
  windowPadding?: Vec2;
  itemSpacing?: Vec2;
  framePadding?: Vec2;
  fontSize?: number;
}

interface StyleValues {
  alpha: number;
  windowPadding: Vec2;
  itemSpacing: Vec2;
  framePadding: Vec2;
}

type TrackedStyleVar = keyof StyleValues;

interface LayoutCursor {
  pos: Vec2;
  lastItem: ItemRect;
}

const TRACKED_VARS: readonly StyleVarId[] = ["alpha", "windowPadding", "itemSpacing", "framePadding"];

function isTracked(slot: StyleVarId): slot is TrackedStyleVar {
  return TRACKED_VARS.includes(slot);
}

/** Strip the "##id" suffix used to disambiguate labels */
export function visibleLabel(label: string): string {
  const idx = label.indexOf("##");
  return idx === -1 ? label : label.slice(0, idx);
}

export class HeadlessBackend implements DrawingBackend {
  readonly windowSize: Vec2;
  readonly commands: DrawCommand[] = [];

  private style: StyleValues;
  private styleVarStack: { slot: StyleVarId; previous: StyleValues[TrackedStyleVar] | null }[] = [];
  private colors = new Map<StyleColorId, Color>();
  private colorStack: { slot: StyleColorId; previous: Color | undefined }[] = [];
  private fontStack: FontInfo[] = [];
  private disabledStack: boolean[] = [];
  private itemWidthStack: number[] = [];
  private overlayStack: LayoutCursor[] = [];
  private defaultFontSize: number;

  private cursor: LayoutCursor;

  // Scripted interactions, consumed by the next matching primitive
  private clicks = new Set<string>();
  private edits = new Map<string, string>();
  private picks = new Map<string, number>();

  constructor(options: HeadlessBackendOptions = {}) {
    this.windowSize = options.windowSize ?? [400, 300];
    this.defaultFontSize = options.fontSize ?? 14;
    this.style = {
      alpha: 1,
      windowPadding: options.windowPadding ?? [8, 8],
      itemSpacing: options.itemSpacing ?? [8, 4],
      framePadding: options.framePadding ?? [4, 3],
    };
    this.cursor = this.initialCursor();
  }

  private initialCursor(): LayoutCursor {
    const start = clone(this.style.windowPadding);
    return { pos: start, lastItem: { min: clone(start), max: clone(start) } };
  }

  /**
   * Start a new frame: clear recorded commands and return to the top-left.
   * Style stacks are expected to be empty already.
   */
  newFrame(): void {
    this.commands.length = 0;
    this.cursor = this.initialCursor();
  }

  // ==================== Scripted Input ====================

  /** Make the next button/selectable with this label report a click */
  click(label: string): void {
    this.clicks.add(label);
  }

  /** Make the next input text with this label report a change to `value` */
  edit(label: string, value: string): void {
    this.edits.set(label, value);
  }

  /** Make the next combo with this label report `index` as picked */
  pick(label: string, index: number): void {
    this.picks.set(label, index);
  }

  // ==================== Style Stacks ====================

  pushStyleColor(slot: StyleColorId, color: Color): void {
    this.colorStack.push({ slot, previous: this.colors.get(slot) });
    this.colors.set(slot, color);
  }

  popStyleColor(count: number): void {
    for (let i = 0; i < count; i++) {
      const entry = this.colorStack.pop();
      if (!entry) throw new Error("[HeadlessBackend] popStyleColor underflow");
      if (entry.previous === undefined) {
        this.colors.delete(entry.slot);
      } else {
        this.colors.set(entry.slot, entry.previous);
      }
    }
  }

  pushStyleVar(slot: StyleVarId, value: StyleVarValue): void {
    if (!isTracked(slot)) {
      this.styleVarStack.push({ slot, previous: null });
      return;
    }

    this.styleVarStack.push({ slot, previous: this.style[slot] });
    if (slot === "alpha") {
      this.style.alpha = value.kind === "scalar" ? value.value : value.value[0];
    } else {
      this.style[slot] = value.kind === "vector" ? clone(value.value) : [value.value, value.value];
    }
  }

  popStyleVar(count: number): void {
    for (let i = 0; i < count; i++) {
      const entry = this.styleVarStack.pop();
      if (!entry) throw new Error("[HeadlessBackend] popStyleVar underflow");
      if (entry.previous === null || !isTracked(entry.slot)) continue;

      if (entry.slot === "alpha") {
        if (typeof entry.previous === "number") this.style.alpha = entry.previous;
      } else if (typeof entry.previous !== "number") {
        this.style[entry.slot] = entry.previous;
      }
    }
  }

  pushFont(font: FontInfo): void {
    this.fontStack.push(font);
  }

  popFont(): void {
    if (this.fontStack.pop() === undefined) throw new Error("[HeadlessBackend] popFont underflow");
  }

  pushDisabled(disabled: boolean): void {
    this.disabledStack.push(disabled);
  }

  popDisabled(): void {
    if (this.disabledStack.pop() === undefined) throw new Error("[HeadlessBackend] popDisabled underflow");
  }

  pushItemWidth(width: number): void {
    this.itemWidthStack.push(width);
  }

  popItemWidth(): void {
    if (this.itemWidthStack.pop() === undefined) throw new Error("[HeadlessBackend] popItemWidth underflow");
  }

  // ==================== Inspection ====================

  getColor(slot: StyleColorId): Color | undefined {
    return this.colors.get(slot);
  }

  getAlpha(): number {
    return this.style.alpha;
  }

  isDisabled(): boolean {
    return this.disabledStack.some((disabled) => disabled);
  }

  getCurrentFont(): FontInfo | undefined {
    return this.fontStack[this.fontStack.length - 1];
  }

  /** Total entries currently pushed across all style stacks */
  getOpenScopes(): number {
    return (
      this.colorStack.length +
      this.styleVarStack.length +
      this.fontStack.length +
      this.disabledStack.length +
      this.itemWidthStack.length +
      this.overlayStack.length
    );
  }

  // ==================== Cursor & Metrics ====================

  getCursorPos(): Vec2 {
    return clone(this.cursor.pos);
  }

  setCursorPos(pos: Vec2): void {
    this.cursor.pos = clone(pos);
  }

  sameLine(): void {
    const { lastItem } = this.cursor;
    this.cursor.pos = [lastItem.max[0] + this.style.itemSpacing[0], lastItem.min[1]];
  }

  getContentRegionAvail(): Vec2 {
    const [padX, padY] = this.style.windowPadding;
    return [
      this.windowSize[0] - padX - this.cursor.pos[0],
      this.windowSize[1] - padY - this.cursor.pos[1],
    ];
  }

  getWindowPadding(): Vec2 {
    return clone(this.style.windowPadding);
  }

  getItemSpacing(): Vec2 {
    return clone(this.style.itemSpacing);
  }

  getItemRect(): ItemRect {
    const { lastItem } = this.cursor;
    return { min: clone(lastItem.min), max: clone(lastItem.max) };
  }

  // ==================== Overlays ====================

  beginOverlay(pos: Vec2): void {
    this.overlayStack.push(this.cursor);
    const start = add(pos, this.style.windowPadding);
    this.cursor = { pos: start, lastItem: { min: clone(start), max: clone(start) } };
  }

  endOverlay(): void {
    const saved = this.overlayStack.pop();
    if (!saved) throw new Error("[HeadlessBackend] endOverlay without beginOverlay");
    this.cursor = saved;
  }

  // ==================== Primitives ====================

  private fontSize(): number {
    return this.getCurrentFont()?.size ?? this.defaultFontSize;
  }

  /** Width of a string in the current font */
  textWidth(text: string): number {
    return text.length * this.fontSize() * 0.5;
  }

  private frameHeight(): number {
    return this.fontSize() + 2 * this.style.framePadding[1];
  }

  private itemWidth(): number {
    const pushed = this.itemWidthStack[this.itemWidthStack.length - 1];
    return pushed ?? this.windowSize[0] * 0.65;
  }

  /**
   * Place an item at the cursor and advance to the next row.
   */
  private addItem(kind: DrawCommandKind, text: string, size: Vec2): ItemRect {
    const min = clone(this.cursor.pos);
    const rect: ItemRect = { min, max: add(min, size) };

    this.commands.push({
      kind,
      text,
      rect,
      alpha: this.style.alpha,
      disabled: this.isDisabled(),
      font: this.getCurrentFont()?.key ?? "",
      overlay: this.overlayStack.length,
    });

    this.cursor.lastItem = rect;
    this.cursor.pos = [this.style.windowPadding[0], rect.max[1] + this.style.itemSpacing[1]];
    if (this.overlayStack.length > 0) {
      // Overlay rows start at the overlay's left edge, not the window's
      this.cursor.pos[0] = min[0];
    }
    return rect;
  }

  text(text: string, wrapped: boolean): void {
    const maxWidth = this.getContentRegionAvail()[0];
    const width = this.textWidth(text);
    if (wrapped && width > maxWidth && maxWidth > 0) {
      const lines = Math.ceil(width / maxWidth);
      this.addItem("text", text, [maxWidth, lines * this.fontSize()]);
      return;
    }
    this.addItem("text", text, [width, this.fontSize()]);
  }

  button(label: string): boolean {
    const text = visibleLabel(label);
    const width = this.textWidth(text) + 2 * this.style.framePadding[0];
    this.addItem("button", text, [width, this.frameHeight()]);
    return this.consumeClick(label);
  }

  selectable(label: string, _selected: boolean): boolean {
    const text = visibleLabel(label);
    this.addItem("selectable", text, [this.getContentRegionAvail()[0], this.fontSize()]);
    return this.consumeClick(label);
  }

  combo(label: string, preview: string, _items: readonly string[], _selected: number): number | null {
    this.addItem("combo", preview, [this.itemWidth(), this.frameHeight()]);

    const picked = this.picks.get(label);
    if (picked === undefined || this.isDisabled()) return null;
    this.picks.delete(label);
    return picked;
  }

  inputText(label: string, _hint: string, value: string): InputTextResult {
    const edit = this.edits.get(label);
    const enabled = !this.isDisabled();
    const next = edit !== undefined && enabled ? edit : value;
    if (edit !== undefined && enabled) {
      this.edits.delete(label);
    }

    this.addItem("inputText", next, [this.itemWidth(), this.frameHeight()]);
    return { changed: next !== value, value: next };
  }

  private consumeClick(label: string): boolean {
    if (!this.clicks.has(label) || this.isDisabled()) return false;
    this.clicks.delete(label);
    return true;
  }
}
