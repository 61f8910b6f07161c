/**
 * 2D vector utilities for layout math
 */

/** 2D vector as [x, y] tuple */
export type Vec2 = [number, number];

export function add(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/**
 * Copy a vector so callers can't mutate backend-owned state.
 */
export function clone(v: Vec2): Vec2 {
  return [v[0], v[1]];
}
