/**
 * Input Text Widget
 *
 * Single-line text input with optional fuzzy autocomplete. Suggestions are
 * per-input state in the store, so they survive across frames while the
 * widget itself is rebuilt every frame.
 */

import type { Disposable, WidgetId } from "../StateStore";
import type { UIContext } from "../UIContext";
import { findMatches, type FuzzyMatch } from "./fuzzy";
import { Layout, type ValueRef, type Widget } from "./Widget";
import { label } from "./Label";

/** Internal input text state */
export class InputTextState implements Disposable {
  matches: FuzzyMatch[] = [];

  dispose(): void {
    this.matches = [];
  }
}

export class InputTextWidget implements Widget {
  readonly kind = "inputText";
  private id: WidgetId;
  private value: ValueRef<string>;
  private hintText: string = "";
  private width: number = 0;
  private candidates: readonly string[] = [];
  private onChangeHandler: (() => void) | null = null;

  constructor(id: WidgetId, value: ValueRef<string>) {
    this.id = id;
    this.value = value;
  }

  /** Explicit label; also the state store key */
  label(text: string): this {
    this.id = text;
    return this;
  }

  getId(): WidgetId {
    return this.id;
  }

  hint(hint: string): this {
    this.hintText = hint;
    return this;
  }

  /** Item width in pixels; 0 keeps the backend default */
  size(width: number): this {
    this.width = width;
    return this;
  }

  /**
   * Suggest candidates fuzzy-matching the current value.
   * The confirm key (Enter by default) accepts the first suggestion.
   */
  autoComplete(candidates: readonly string[]): this {
    this.candidates = candidates;
    return this;
  }

  onChange(handler: () => void): this {
    this.onChangeHandler = handler;
    return this;
  }

  build(ui: UIContext): void {
    const state = ui.getState().getOrCreate(this.id, InputTextState, () => new InputTextState());

    if (this.width !== 0) {
      ui.pushItemWidth(this.width);
    }

    let changed = false;
    try {
      const result = ui.backend.inputText(this.id, this.hintText, this.value.value);
      if (result.changed) {
        this.value.value = result.value;
        changed = true;
      }
    } finally {
      if (this.width !== 0) {
        ui.popItemWidth();
      }
    }

    if (changed) {
      if (this.onChangeHandler) {
        this.onChangeHandler();
      }

      const { maxMatches } = ui.getConfig().autoComplete;
      state.matches = findMatches(this.value.value, this.candidates).slice(0, maxMatches);
    }

    if (state.matches.length === 0) {
      return;
    }

    // Suggestions hang below the input's lower-left corner
    const rect = ui.getItemRect();
    ui.overlay([rect.min[0], rect.max[1]], new Layout(state.matches.map((match) => label(match.str))));

    const top = state.matches[0];
    if (top && ui.getInput().isKeyPressed(ui.getConfig().autoComplete.confirmKey)) {
      this.value.value = top.str;
      state.matches = [];
    }
  }
}

/**
 * Text input bound to `value`. Without `.label()`, the identifier is
 * generated from the call's position in the frame.
 */
export function inputText(ui: UIContext, value: ValueRef<string>): InputTextWidget {
  return new InputTextWidget(ui.generateID("##InputText"), value);
}
