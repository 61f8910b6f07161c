/** RGBA color in 0-1 range */
export type Color = [number, number, number, number];

/**
 * Build a color from 0-255 channel values.
 */
export function rgba255(r: number, g: number, b: number, a: number = 255): Color {
  return [r / 255, g / 255, b / 255, a / 255];
}
