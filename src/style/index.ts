/**
 * Style Module
 *
 * Style slots and scoped overrides.
 */

export type { StyleColorId, StyleVarId, StyleVarKind, StyleVarValue } from "./types";
export { STYLE_VAR_KINDS, scalar, vector, styleVarKind, coerceStyleVar } from "./types";
export { StyleSetter, style } from "./StyleSetter";
