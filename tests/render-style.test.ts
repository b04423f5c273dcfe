import { describe, it, expect } from "vitest";
import { Render, InvalidColorError, InvalidStyleError } from "../src/index.js";
import type { StyleInput } from "../src/index.js";

// ─────────────────────────────────────────────
// Colors
// ─────────────────────────────────────────────

describe("Render.parseHexColor()", () => {
  it("parses #RRGGBB", () => {
    expect(Render.parseHexColor("#FF8000")).toEqual({ r: 255, g: 128, b: 0 });
  });

  it("parses without # and in lowercase", () => {
    expect(Render.parseHexColor("1a73e8")).toEqual({ r: 26, g: 115, b: 232 });
  });

  it("expands #RGB", () => {
    expect(Render.parseHexColor("#f80")).toEqual({ r: 255, g: 136, b: 0 });
  });

  it("ignores surrounding whitespace", () => {
    expect(Render.parseHexColor("  #000000 ")).toEqual({ r: 0, g: 0, b: 0 });
  });

  it.each(["#12345", "red", "#GGGGGG", "", "#1234567"])("rejects %j", (value) => {
    expect(() => Render.parseHexColor(value)).toThrow(InvalidColorError);
  });

  it("names the field and value on the error", () => {
    try {
      Render.parseHexColor("blue", "moduleColor");
      expect.unreachable("parseHexColor should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidColorError);
      expect(err).toMatchObject({ value: "blue", field: "moduleColor" });
      expect(err).toHaveProperty("message", expect.stringMatching(/^moduleColor: "blue"/));
    }
  });
});

describe("Render.toHex() / Render.mix()", () => {
  it("formats lowercase #rrggbb", () => {
    expect(Render.toHex({ r: 26, g: 115, b: 232 })).toBe("#1a73e8");
    expect(Render.toHex({ r: 0, g: 5, b: 255 })).toBe("#0005ff");
  });

  it("interpolates and rounds per channel", () => {
    const black = { r: 0, g: 0, b: 0 };
    const white = { r: 255, g: 255, b: 255 };
    expect(Render.mix(black, white, 0)).toEqual(black);
    expect(Render.mix(black, white, 1)).toEqual(white);
    expect(Render.mix(black, white, 0.5)).toEqual({ r: 128, g: 128, b: 128 });
    expect(Render.mix({ r: 100, g: 0, b: 0 }, { r: 200, g: 0, b: 0 }, 0.25)).toEqual({ r: 125, g: 0, b: 0 });
  });
});

// ─────────────────────────────────────────────
// Style resolution
// ─────────────────────────────────────────────

describe("Render.resolveStyle() — defaults", () => {
  it("fills every field", () => {
    const { style, adjustments } = Render.resolveStyle();
    expect(style).toEqual({
      moduleColor: { r: 0, g: 0, b: 0 },
      backgroundColor: { r: 255, g: 255, b: 255 },
      modulePixelSize: 15,
      logoShape: "square",
      logoBackgroundStyle: "solid",
      logoSizeRatio: 0.25,
      borderWidth: 0,
      borderColor: { r: 0, g: 0, b: 0 },
    });
    expect(adjustments).toEqual([]);
  });

  it("defaults the border color to the module color", () => {
    const { style } = Render.resolveStyle({ moduleColor: "#123456" });
    expect(style.borderColor).toEqual({ r: 0x12, g: 0x34, b: 0x56 });
  });

  it("keeps an explicit border color", () => {
    const { style } = Render.resolveStyle({ moduleColor: "#123456", borderColor: "#fff" });
    expect(style.borderColor).toEqual({ r: 255, g: 255, b: 255 });
  });
});

describe("Render.resolveStyle() — logo size", () => {
  it("clamps ratios above 0.35 and records the adjustment", () => {
    const { style, adjustments } = Render.resolveStyle({ logoSizeRatio: 0.5 });
    expect(style.logoSizeRatio).toBe(Render.MAX_LOGO_SIZE_RATIO);
    expect(adjustments).toHaveLength(1);
    expect(adjustments[0]).toMatchObject({ field: "logoSizeRatio", requested: 0.5, applied: 0.35 });
  });

  it("accepts exactly 0.35", () => {
    const { style, adjustments } = Render.resolveStyle({ logoSizeRatio: 0.35 });
    expect(style.logoSizeRatio).toBe(0.35);
    expect(adjustments).toEqual([]);
  });

  it.each([0, -0.1, Number.NaN, Number.POSITIVE_INFINITY])("rejects %s", (ratio) => {
    expect(() => Render.resolveStyle({ logoSizeRatio: ratio })).toThrow(InvalidStyleError);
  });
});

describe("Render.resolveStyle() — validation", () => {
  it("rejects a non-integer or zero module size", () => {
    expect(() => Render.resolveStyle({ modulePixelSize: 0 })).toThrow(/modulePixelSize/);
    expect(() => Render.resolveStyle({ modulePixelSize: 1.5 })).toThrow(/modulePixelSize/);
  });

  it("rejects a negative border width", () => {
    try {
      Render.resolveStyle({ borderWidth: -1 });
      expect.unreachable("resolveStyle should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidStyleError);
      expect(err).toMatchObject({ field: "borderWidth" });
    }
  });

  it("rejects unknown shapes and background styles from untyped input", () => {
    const shape: StyleInput = JSON.parse('{"logoShape":"hexagon"}');
    const background: StyleInput = JSON.parse('{"logoBackgroundStyle":"blur"}');
    expect(() => Render.resolveStyle(shape)).toThrow(/logoShape must be one of square, circle, rounded-rect/);
    expect(() => Render.resolveStyle(background)).toThrow(/logoBackgroundStyle must be one of/);
  });

  it("rejects invalid colors with InvalidColorError", () => {
    expect(() => Render.resolveStyle({ backgroundColor: "white" })).toThrow(InvalidColorError);
  });
});
