/**
 * UI Widgets
 *
 * Immediate mode widgets for the UI system.
 */

export { Layout, layout, custom, ref, type Widget, type LayoutItem, type ValueRef } from "./Widget";
export { LabelWidget, label } from "./Label";
export { ButtonWidget, button } from "./Button";
export { SelectableWidget, selectable } from "./Selectable";
export { ComboWidget, combo } from "./Combo";
export { InputTextWidget, InputTextState, inputText } from "./InputText";
export { findMatches, fuzzyScore, type FuzzyMatch } from "./fuzzy";
