/**
 * Immediate Mode UI System
 *
 * Per-frame widget composition over a pluggable drawing backend.
 */

// Core
export { UIContext, type UIContextOptions } from "./UIContext";
export { StateStore, type WidgetId, type Disposable, type StateClass } from "./StateStore";
export { IdAllocator } from "./IdAllocator";
export { InputLayer } from "./InputLayer";
export { FontInfo, FontRegistry } from "./FontRegistry";
export { StyleStack, type StackCategory } from "./StyleStack";
export { UIInvariantError } from "./errors";

// Config
export {
  type UIConfig,
  type PartialUIConfig,
  type AlignmentConfig,
  type AutoCompleteConfig,
  type FontConfig,
  DEFAULT_CONFIG,
  mergeConfig,
} from "./UIConfig";

// Widgets
export * from "./widgets";
