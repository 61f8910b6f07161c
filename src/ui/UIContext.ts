/**
 * UI Context
 *
 * Main entry point for immediate mode UI composition.
 * Owns everything that outlives a single frame (state store, identifier
 * sequence, font registry, key state) and routes style pushes to the
 * backend through a balance-checked stack.
 *
 * Not thread-safe: one build pass at a time, on the thread that owns it.
 */

import type { Vec2 } from "../math/vec2";
import type { Color } from "../types/color";
import type { DrawingBackend, ItemRect } from "../backend/types";
import type { StyleColorId, StyleVarId, StyleVarValue } from "../style/types";
import { dryRunMeasurer, type WidgetMeasurer } from "../layout/measure";
import { StateStore, type WidgetId } from "./StateStore";
import { IdAllocator } from "./IdAllocator";
import { InputLayer } from "./InputLayer";
import { FontRegistry, type FontInfo } from "./FontRegistry";
import { StyleStack, type StackCategory } from "./StyleStack";
import { type UIConfig, type PartialUIConfig, DEFAULT_CONFIG, mergeConfig } from "./UIConfig";
import type { Widget } from "./widgets/Widget";

export interface UIContextOptions {
  backend: DrawingBackend;
  config?: PartialUIConfig;
  /** Replaces dry-run measurement for backends that can measure up front */
  measurer?: WidgetMeasurer;
}

/**
 * Immediate mode UI context.
 *
 * The application describes its whole interface each frame as a layout
 * returned from the `runFrame` callback, or brackets its own builds with
 * `beginFrame`/`endFrame`.
 */
export class UIContext {
  readonly backend: DrawingBackend;

  private config: UIConfig;
  private state: StateStore;
  private ids: IdAllocator;
  private input: InputLayer;
  private fonts: FontRegistry;
  private stack: StyleStack;
  private measurer: WidgetMeasurer;

  // Frame state
  private inFrame: boolean = false;
  private frameCount: number = 0;

  constructor(options: UIContextOptions) {
    this.backend = options.backend;
    this.config = options.config ? mergeConfig(options.config) : DEFAULT_CONFIG;
    this.state = new StateStore();
    this.ids = new IdAllocator();
    this.input = new InputLayer();
    this.fonts = new FontRegistry(this.config.fonts.default);
    this.stack = new StyleStack();
    this.measurer = options.measurer ?? dryRunMeasurer;
  }

  // ==================== Frame Lifecycle ====================

  /**
   * Begin a new UI frame.
   * Must be called before any widget is built.
   */
  beginFrame(): void {
    if (this.inFrame) {
      throw new Error("Already in UI frame - call endFrame() first");
    }

    this.inFrame = true;
    this.ids.beginFrame();
    this.backend.newFrame?.();
  }

  /**
   * End the UI frame. Throws if any style scope was left open, after
   * popping the leftovers from the backend.
   */
  endFrame(): void {
    if (!this.inFrame) {
      throw new Error("Not in UI frame - call beginFrame() first");
    }

    this.inFrame = false;
    this.frameCount++;
    this.input.endFrame();

    try {
      this.stack.assertBalanced("UIContext.endFrame");
    } finally {
      this.unwindBackend();
    }
  }

  /**
   * Describe and build a whole frame. `describe` runs after the frame has
   * begun, so identifiers generated while constructing widgets are stable
   * from frame to frame. A fault raised while building aborts the frame
   * and is rethrown; the next frame starts clean.
   */
  runFrame(describe: (ui: UIContext) => Widget): void {
    this.beginFrame();
    try {
      describe(this).build(this);
    } catch (err) {
      this.abortFrame();
      throw err;
    }
    this.endFrame();
  }

  /**
   * Abandon the current frame without the balance check. Open scopes are
   * popped from the backend.
   */
  abortFrame(): void {
    this.inFrame = false;
    this.input.endFrame();
    this.unwindBackend();
  }

  /**
   * Pop whatever is still pushed on the backend, innermost category first,
   * and zero the tracker.
   */
  private unwindBackend(): void {
    try {
      for (let i = this.stack.depth("overlay"); i > 0; i--) this.backend.endOverlay();
      for (let i = this.stack.depth("itemWidth"); i > 0; i--) this.backend.popItemWidth();
      for (let i = this.stack.depth("disabled"); i > 0; i--) this.backend.popDisabled();
      for (let i = this.stack.depth("font"); i > 0; i--) this.backend.popFont();

      const styleVars = this.stack.depth("styleVar");
      if (styleVars > 0) this.backend.popStyleVar(styleVars);
      const colors = this.stack.depth("color");
      if (colors > 0) this.backend.popStyleColor(colors);
    } finally {
      this.stack.reset();
    }
  }

  isInFrame(): boolean {
    return this.inFrame;
  }

  /** Number of frames completed */
  getFrameCount(): number {
    return this.frameCount;
  }

  // ==================== Identity & State ====================

  /**
   * Generate an identifier from a prefix and the call's position in the frame.
   */
  generateID(prefix: string): WidgetId {
    return this.ids.generateID(prefix);
  }

  // ==================== Style Scopes ====================

  pushStyleColor(slot: StyleColorId, color: Color): void {
    this.stack.push("color");
    this.backend.pushStyleColor(slot, color);
  }

  popStyleColor(count: number = 1): void {
    this.stack.pop("color", count);
    if (count > 0) this.backend.popStyleColor(count);
  }

  pushStyleVar(slot: StyleVarId, value: StyleVarValue): void {
    this.stack.push("styleVar");
    this.backend.pushStyleVar(slot, value);
  }

  popStyleVar(count: number = 1): void {
    this.stack.pop("styleVar", count);
    if (count > 0) this.backend.popStyleVar(count);
  }

  /**
   * Push a font if the backend has it loaded.
   * Returns false (and pushes nothing) for unloaded fonts.
   */
  pushFont(font: FontInfo): boolean {
    if (!this.fonts.isLoaded(font)) {
      if (this.config.warnings && this.fonts.shouldWarn(font)) {
        console.warn(`[UIContext] Font ${font.key} is not loaded, keeping the current font`);
      }
      return false;
    }

    this.stack.push("font");
    this.backend.pushFont(font);
    return true;
  }

  popFont(): void {
    this.stack.pop("font");
    this.backend.popFont();
  }

  pushDisabled(disabled: boolean): void {
    this.stack.push("disabled");
    this.backend.pushDisabled(disabled);
  }

  popDisabled(): void {
    this.stack.pop("disabled");
    this.backend.popDisabled();
  }

  pushItemWidth(width: number): void {
    this.stack.push("itemWidth");
    this.backend.pushItemWidth(width);
  }

  popItemWidth(): void {
    this.stack.pop("itemWidth");
    this.backend.popItemWidth();
  }

  /**
   * Build a layout inside a floating overlay anchored at `pos`.
   */
  overlay(pos: Vec2, content: Widget): void {
    this.stack.push("overlay");
    this.backend.beginOverlay(pos);
    try {
      content.build(this);
    } finally {
      this.stack.pop("overlay");
      this.backend.endOverlay();
    }
  }

  // ==================== Cursor & Metrics ====================

  getCursorPos(): Vec2 {
    return this.backend.getCursorPos();
  }

  setCursorPos(pos: Vec2): void {
    this.backend.setCursorPos(pos);
  }

  sameLine(): void {
    this.backend.sameLine();
  }

  getContentRegionAvail(): Vec2 {
    return this.backend.getContentRegionAvail();
  }

  getWindowPadding(): Vec2 {
    return this.backend.getWindowPadding();
  }

  getItemSpacing(): Vec2 {
    return this.backend.getItemSpacing();
  }

  getItemRect(): ItemRect {
    return this.backend.getItemRect();
  }

  // ==================== Accessors ====================

  getConfig(): UIConfig {
    return this.config;
  }

  /** Get the cross-frame state store */
  getState(): StateStore {
    return this.state;
  }

  getInput(): InputLayer {
    return this.input;
  }

  getFonts(): FontRegistry {
    return this.fonts;
  }

  getMeasurer(): WidgetMeasurer {
    return this.measurer;
  }

  /**
   * Current depth of a tracked style stack category.
   */
  getStackDepth(category: StackCategory): number {
    return this.stack.depth(category);
  }
}
