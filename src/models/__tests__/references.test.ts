import { describe, it, expect } from "vitest";
import {
  ModelReference,
  ModelReferenceList,
  coffeeScript,
  customModel,
  javaScript,
  model,
  needsCompilation,
  requirementsOf,
  widget,
} from "../references.js";

describe("requirementsOf", () => {
  it("plain models need no optional component", () => {
    expect(requirementsOf(model("Plot"))).toEqual({ widgets: false, compiler: false });
  });

  it("widgets need the widgets component", () => {
    expect(requirementsOf(widget("Slider"))).toEqual({ widgets: true, compiler: false });
  });

  it("custom models with coffeescript source need the compiler", () => {
    const ref = customModel("MyTool", coffeeScript("class MyTool extends Tool"));
    expect(requirementsOf(ref)).toEqual({ widgets: false, compiler: true });
  });

  it("custom models with plain javascript need nothing extra", () => {
    const ref = customModel("MyTool", javaScript("var MyTool = Tool.extend({});"));
    expect(requirementsOf(ref)).toEqual({ widgets: false, compiler: false });
  });
});

describe("needsCompilation", () => {
  it("is true only for coffeescript", () => {
    expect(needsCompilation(coffeeScript("x = 1"))).toBe(true);
    expect(needsCompilation(javaScript("var x = 1;"))).toBe(false);
  });
});

describe("ModelReference schema", () => {
  it("parses every reference kind", () => {
    const result = ModelReferenceList.safeParse([
      { kind: "model", type: "Plot" },
      { kind: "widget", type: "Button" },
      { kind: "custom", type: "Gauge", implementation: { language: "coffeescript", code: "x = 1" } },
    ]);

    expect(result.success).toBe(true);
    expect(result.data?.map(r => r.kind)).toEqual(["model", "widget", "custom"]);
  });

  it("rejects unknown kinds", () => {
    expect(ModelReference.safeParse({ kind: "glyph", type: "Circle" }).success).toBe(false);
  });

  it("rejects custom models without an implementation", () => {
    expect(ModelReference.safeParse({ kind: "custom", type: "Gauge" }).success).toBe(false);
  });

  it("rejects unsupported implementation languages", () => {
    const result = ModelReference.safeParse({
      kind: "custom",
      type: "Gauge",
      implementation: { language: "typescript", code: "let x = 1" },
    });
    expect(result.success).toBe(false);
  });

  it("rejects an empty type name", () => {
    expect(ModelReference.safeParse({ kind: "model", type: "" }).success).toBe(false);
  });
});
