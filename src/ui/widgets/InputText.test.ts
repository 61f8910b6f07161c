import { describe, it, expect, vi } from "vitest";
import { HeadlessBackend } from "../../backend/HeadlessBackend";
import { UIContext } from "../UIContext";
import { UIInvariantError } from "../errors";
import type { PartialUIConfig } from "../UIConfig";
import { inputText, InputTextState } from "./InputText";
import { layout, ref } from "./Widget";

const CITIES = ["abc", "xyz", "abd"];

function setup(config: PartialUIConfig = {}) {
  const backend = new HeadlessBackend();
  const ui = new UIContext({ backend, config });
  return { backend, ui };
}

describe("inputText", () => {
  it("generates its identifier from the frame position", () => {
    const { ui } = setup();
    const ids: string[] = [];

    ui.runFrame((ctx) => {
      const widget = inputText(ctx, ref(""));
      ids.push(widget.getId());
      return widget;
    });
    ui.runFrame((ctx) => {
      const widget = inputText(ctx, ref(""));
      ids.push(widget.getId());
      return widget;
    });

    expect(ids).toEqual(["##InputText##1", "##InputText##1"]);
    expect(ui.getState().getAs("##InputText##1", InputTextState)).toBeInstanceOf(InputTextState);
  });

  it("reuses the same state entries when the frame is rebuilt unchanged", () => {
    const { ui } = setup();
    const first = ref("");
    const second = ref("");
    const frame = (ctx: UIContext) => layout(inputText(ctx, first), inputText(ctx, second));

    ui.runFrame(frame);
    const before = [
      ui.getState().getAs("##InputText##1", InputTextState),
      ui.getState().getAs("##InputText##2", InputTextState),
    ];
    ui.runFrame(frame);

    expect(ui.getState().size).toBe(2);
    expect(ui.getState().getAs("##InputText##1", InputTextState)).toBe(before[0]);
    expect(ui.getState().getAs("##InputText##2", InputTextState)).toBe(before[1]);
  });

  it("writes edits back and calls onChange", () => {
    const { backend, ui } = setup();
    const value = ref("");
    const onChange = vi.fn();

    backend.edit("name", "test-user");
    ui.runFrame((ctx) => inputText(ctx, value).label("name").onChange(onChange));

    expect(value.value).toBe("test-user");
    expect(onChange).toHaveBeenCalledTimes(1);
  });

  it("applies its width for the duration of the build", () => {
    const { backend, ui } = setup();

    ui.runFrame((ctx) => inputText(ctx, ref("")).label("w").size(120));

    expect(backend.commands[0]?.rect).toEqual({ min: [8, 8], max: [128, 28] });
    expect(backend.getOpenScopes()).toBe(0);
  });

  describe("autocomplete", () => {
    it("shows ranked suggestions below the input", () => {
      const { backend, ui } = setup();
      const value = ref("");

      backend.edit("city", "ab");
      ui.runFrame((ctx) => inputText(ctx, value).label("city").autoComplete(CITIES));

      const suggestions = backend.commands.filter((c) => c.overlay === 1);
      expect(suggestions.map((c) => c.text)).toEqual(["abc", "abd"]);
      expect(suggestions.map((c) => c.rect.min)).toEqual([
        [16, 36],
        [16, 54],
      ]);

      const state = ui.getState().getAs("city", InputTextState);
      expect(state?.matches.map((m) => m.str)).toEqual(["abc", "abd"]);
    });

    it("keeps suggestions across frames without edits", () => {
      const { backend, ui } = setup();
      const value = ref("");
      const frame = (ctx: UIContext) => inputText(ctx, value).label("city").autoComplete(CITIES);

      backend.edit("city", "ab");
      ui.runFrame(frame);
      ui.runFrame(frame);

      expect(backend.commands.filter((c) => c.overlay === 1).map((c) => c.text)).toEqual(["abc", "abd"]);
    });

    it("accepts the top suggestion on the confirm key", () => {
      const { backend, ui } = setup();
      const value = ref("");
      const onChange = vi.fn();
      const frame = (ctx: UIContext) =>
        inputText(ctx, value).label("city").autoComplete(CITIES).onChange(onChange);

      backend.edit("city", "ab");
      ui.runFrame(frame);
      ui.getInput().keyDown("Enter");
      ui.runFrame(frame);

      expect(value.value).toBe("abc");
      expect(ui.getState().getAs("city", InputTextState)?.matches).toEqual([]);
      expect(onChange).toHaveBeenCalledTimes(1);

      ui.runFrame(frame);
      expect(backend.commands.some((c) => c.overlay === 1)).toBe(false);
    });

    it("ignores the confirm key without suggestions", () => {
      const { ui } = setup();
      const value = ref("typed");

      ui.getInput().keyDown("Enter");
      ui.runFrame((ctx) => inputText(ctx, value).label("city").autoComplete(CITIES));

      expect(value.value).toBe("typed");
    });

    it("clears suggestions when nothing matches", () => {
      const { backend, ui } = setup();
      const value = ref("");
      const frame = (ctx: UIContext) => inputText(ctx, value).label("city").autoComplete(CITIES);

      backend.edit("city", "ab");
      ui.runFrame(frame);
      backend.edit("city", "qq");
      ui.runFrame(frame);

      expect(ui.getState().getAs("city", InputTextState)?.matches).toEqual([]);
      expect(backend.commands).toHaveLength(1);
    });

    it("limits suggestions to maxMatches", () => {
      const { backend, ui } = setup({ autoComplete: { maxMatches: 1 } });
      const value = ref("");

      backend.edit("city", "ab");
      ui.runFrame((ctx) => inputText(ctx, value).label("city").autoComplete(CITIES));

      expect(backend.commands.filter((c) => c.overlay === 1).map((c) => c.text)).toEqual(["abc"]);
    });

    it("uses the configured confirm key", () => {
      const { backend, ui } = setup({ autoComplete: { confirmKey: "Tab" } });
      const value = ref("");
      const frame = (ctx: UIContext) => inputText(ctx, value).label("city").autoComplete(CITIES);

      backend.edit("city", "xy");
      ui.runFrame(frame);
      ui.getInput().keyDown("Enter");
      ui.runFrame(frame);
      expect(value.value).toBe("xy");

      ui.getInput().keyDown("Tab");
      ui.runFrame(frame);
      expect(value.value).toBe("xyz");
    });
  });

  it("throws when its identifier holds another widget's state", () => {
    const { ui } = setup();
    ui.getState().set("city", { dispose: () => {} });

    expect(() => ui.runFrame((ctx) => inputText(ctx, ref("")).label("city"))).toThrow(UIInvariantError);
    expect(ui.isInFrame()).toBe(false);
  });
});
