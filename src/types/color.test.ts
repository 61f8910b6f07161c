import { describe, it, expect } from "vitest";
import { rgba255 } from "./color";

describe("rgba255", () => {
  it("scales channels to 0-1", () => {
    const [r, g, b, a] = rgba255(255, 0, 51);
    expect(r).toBe(1);
    expect(g).toBe(0);
    expect(b).toBeCloseTo(0.2);
    expect(a).toBe(1);
  });

  it("takes an explicit alpha", () => {
    expect(rgba255(0, 0, 0, 0)).toEqual([0, 0, 0, 0]);
  });
});
