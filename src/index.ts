/**
 * imlayer - immediate mode UI composition over a pluggable drawing backend
 */

export const VERSION = "0.1.0";

export * from "./ui";
export * from "./style";
export * from "./layout";
export * from "./backend";
export type { Vec2 } from "./math/vec2";
export { type Color, rgba255 } from "./types/color";
