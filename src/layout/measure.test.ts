import { describe, it, expect, vi } from "vitest";
import { HeadlessBackend } from "../backend/HeadlessBackend";
import { UIContext } from "../ui/UIContext";
import { button } from "../ui/widgets/Button";
import { label } from "../ui/widgets/Label";
import { custom } from "../ui/widgets/Widget";
import { dryRunMeasurer, measureThenPlace } from "./measure";

describe("dryRunMeasurer", () => {
  it("returns the rendered width and restores the cursor", () => {
    const backend = new HeadlessBackend();
    const ui = new UIContext({ backend });
    ui.beginFrame();

    const width = dryRunMeasurer.measureWidth(ui, label("Hello"));

    expect(width).toBe(35);
    expect(ui.getCursorPos()).toEqual([8, 8]);
    ui.endFrame();
  });

  it("builds the widget fully transparent", () => {
    const backend = new HeadlessBackend();
    const ui = new UIContext({ backend });
    ui.beginFrame();

    dryRunMeasurer.measureWidth(ui, button("OK"));

    expect(backend.commands.map((c) => c.alpha)).toEqual([0]);
    expect(backend.getAlpha()).toBe(1);
    ui.endFrame();
  });

  it("pops the transparency when the build throws", () => {
    const backend = new HeadlessBackend();
    const ui = new UIContext({ backend });
    ui.beginFrame();

    const failing = custom(() => {
      throw new Error("build failed");
    });

    expect(() => dryRunMeasurer.measureWidth(ui, failing)).toThrow("build failed");
    expect(backend.getAlpha()).toBe(1);
    expect(ui.getStackDepth("styleVar")).toBe(0);
    ui.abortFrame();
  });
});

describe("measureThenPlace", () => {
  it("builds the widget where place puts it", () => {
    const backend = new HeadlessBackend();
    const ui = new UIContext({ backend });
    const place = vi.fn((width: number, origin: [number, number]): [number, number] => [origin[0] + width, origin[1]]);
    ui.beginFrame();

    measureThenPlace(ui, button("OK"), place);

    expect(place).toHaveBeenCalledWith(22, [8, 8]);
    expect(backend.commands[1]?.rect.min).toEqual([30, 8]);
    ui.endFrame();
  });
});
