/**
 * Style Slot Types
 *
 * Color slots, style variables and the scalar/vector classification
 * used when pushing overrides to a drawing backend.
 */

import type { Vec2 } from "../math/vec2";

/** Color slots a backend exposes for override */
export type StyleColorId =
  | "text"
  | "textDisabled"
  | "windowBg"
  | "childBg"
  | "popupBg"
  | "border"
  | "borderShadow"
  | "frameBg"
  | "frameBgHovered"
  | "frameBgActive"
  | "titleBg"
  | "titleBgActive"
  | "titleBgCollapsed"
  | "menuBarBg"
  | "scrollbarBg"
  | "scrollbarGrab"
  | "scrollbarGrabHovered"
  | "scrollbarGrabActive"
  | "checkMark"
  | "sliderGrab"
  | "sliderGrabActive"
  | "button"
  | "buttonHovered"
  | "buttonActive"
  | "header"
  | "headerHovered"
  | "headerActive"
  | "separator"
  | "separatorHovered"
  | "separatorActive"
  | "resizeGrip"
  | "resizeGripHovered"
  | "resizeGripActive"
  | "tab"
  | "tabHovered"
  | "tabActive"
  | "tabUnfocused"
  | "tabUnfocusedActive"
  | "plotLines"
  | "plotLinesHovered"
  | "plotHistogram"
  | "plotHistogramHovered"
  | "tableHeaderBg"
  | "tableBorderStrong"
  | "tableBorderLight"
  | "tableRowBg"
  | "tableRowBgAlt"
  | "textSelectedBg"
  | "dragDropTarget"
  | "navHighlight"
  | "navWindowingHighlight"
  | "navWindowingDimBg"
  | "modalWindowDimBg";

/** Whether a style variable holds one number or an [x, y] pair */
export type StyleVarKind = "scalar" | "vector";

/**
 * Style variable slots and their kinds.
 */
export const STYLE_VAR_KINDS = {
  alpha: "scalar",
  disabledAlpha: "scalar",
  windowPadding: "vector",
  windowRounding: "scalar",
  windowBorderSize: "scalar",
  windowMinSize: "vector",
  windowTitleAlign: "vector",
  childRounding: "scalar",
  childBorderSize: "scalar",
  popupRounding: "scalar",
  popupBorderSize: "scalar",
  framePadding: "vector",
  frameRounding: "scalar",
  frameBorderSize: "scalar",
  itemSpacing: "vector",
  itemInnerSpacing: "vector",
  indentSpacing: "scalar",
  scrollbarSize: "scalar",
  scrollbarRounding: "scalar",
  grabMinSize: "scalar",
  grabRounding: "scalar",
  tabRounding: "scalar",
  buttonTextAlign: "vector",
  selectableTextAlign: "vector",
} as const satisfies Record<string, StyleVarKind>;

export type StyleVarId = keyof typeof STYLE_VAR_KINDS;

/** Style variable value: a single number or an [x, y] pair */
export type StyleVarValue =
  | { kind: "scalar"; value: number }
  | { kind: "vector"; value: Vec2 };

export function scalar(value: number): StyleVarValue {
  return { kind: "scalar", value };
}

export function vector(x: number, y: number): StyleVarValue {
  return { kind: "vector", value: [x, y] };
}

export function styleVarKind(id: StyleVarId): StyleVarKind {
  return STYLE_VAR_KINDS[id];
}

/**
 * Convert an override to the kind its slot expects.
 *
 * A scalar given for a vector slot is broadcast to both axes; a vector
 * given for a scalar slot contributes its x component.
 */
export function coerceStyleVar(id: StyleVarId, value: StyleVarValue): StyleVarValue {
  const kind = styleVarKind(id);
  if (kind === value.kind) {
    return value;
  }

  if (value.kind === "scalar") {
    return vector(value.value, value.value);
  }

  return scalar(value.value[0]);
}
