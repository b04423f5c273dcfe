import { describe, it, expect } from "vitest";
import { QR, Render } from "../src/index.js";
import type { ModuleMatrix, StyleConfig } from "../src/index.js";

function blankMatrix(version: number, quietZone: number): ModuleMatrix {
  const n = version * 4 + 17;
  return QR.normalize({ modules: { size: n, data: new Uint8Array(n * n) }, version, mask: 0, quietZone });
}

function styleWith(overrides: Partial<StyleConfig>): StyleConfig {
  return { ...Render.resolveStyle().style, ...overrides };
}

function planFor(matrix: ModuleMatrix, style: StyleConfig) {
  return Render.plan(matrix, Render.computeLogoRegion(matrix, style), style);
}

// ─────────────────────────────────────────────
// Easing and per-module opacity
// ─────────────────────────────────────────────

describe("Render.smoothstep()", () => {
  it("maps 0 → 0, 0.5 → 0.5, 1 → 1", () => {
    expect(Render.smoothstep(0)).toBe(0);
    expect(Render.smoothstep(0.5)).toBe(0.5);
    expect(Render.smoothstep(1)).toBe(1);
  });

  it("clamps outside [0, 1]", () => {
    expect(Render.smoothstep(-2)).toBe(0);
    expect(Render.smoothstep(3)).toBe(1);
  });

  it("is non-decreasing", () => {
    let previous = 0;
    for (let t = 0; t <= 1; t += 0.01) {
      const value = Render.smoothstep(t);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
  });
});

describe("Render.moduleOpacity()", () => {
  const region = { haloWidth: 10, frameMargin: 4 };

  it("removes modules inside or on the boundary for every style", () => {
    for (const style of Render.LOGO_BACKGROUND_STYLES) {
      expect(Render.moduleOpacity(-1, region, style)).toBe(0);
      expect(Render.moduleOpacity(0, region, style)).toBe(0);
    }
  });

  it("clears the solid frame and keeps everything past it", () => {
    expect(Render.moduleOpacity(4, region, "solid")).toBe(0);
    expect(Render.moduleOpacity(4.01, region, "solid")).toBe(1);
    expect(Render.moduleOpacity(50, region, "solid")).toBe(1);
  });

  it("fades gradient styles over the halo width", () => {
    expect(Render.moduleOpacity(2.5, region, "gradient-halo")).toBeCloseTo(0.15625, 12);
    expect(Render.moduleOpacity(5, region, "gradient-halo")).toBe(0.5);
    expect(Render.moduleOpacity(10, region, "gradient-halo")).toBe(1);
    expect(Render.moduleOpacity(12, region, "radial-gradient")).toBe(1);
  });

  it("is monotonic in distance", () => {
    for (const style of Render.LOGO_BACKGROUND_STYLES) {
      let previous = 0;
      for (let d = -5; d <= 20; d += 0.25) {
        const value = Render.moduleOpacity(d, region, style);
        expect(value).toBeGreaterThanOrEqual(previous);
        expect(value).toBeLessThanOrEqual(1);
        previous = value;
      }
    }
  });
});

// ─────────────────────────────────────────────
// Planning
// ─────────────────────────────────────────────

describe("Render.plan() — suppression", () => {
  const v3 = blankMatrix(3, 4);

  it("suppresses exactly the modules whose center is inside the circle", () => {
    const occlusion = planFor(
      v3,
      styleWith({ modulePixelSize: 10, logoSizeRatio: 0.2, logoShape: "circle", logoBackgroundStyle: "gradient-halo" }),
    );
    for (let row = 0; row < v3.size; row++) {
      for (let col = 0; col < v3.size; col++) {
        const { x, y } = Render.moduleCenter(v3, 10, row, col);
        const inside = Math.hypot(x - 185, y - 185) <= 29;
        expect(Render.opacityAt(occlusion, row, col) === 0).toBe(inside);
      }
    }
  });

  it("suppresses exactly the modules inside the square", () => {
    const occlusion = planFor(
      v3,
      styleWith({ modulePixelSize: 10, logoSizeRatio: 0.2, logoShape: "square", logoBackgroundStyle: "gradient-halo" }),
    );
    for (let row = 0; row < v3.size; row++) {
      for (let col = 0; col < v3.size; col++) {
        const { x, y } = Render.moduleCenter(v3, 10, row, col);
        const inside = Math.max(Math.abs(x - 185), Math.abs(y - 185)) <= 29;
        expect(Render.opacityAt(occlusion, row, col) === 0).toBe(inside);
      }
    }
  });

  it("only produces 0 or 1 for the solid style", () => {
    const occlusion = planFor(v3, styleWith({ modulePixelSize: 10, logoSizeRatio: 0.2, logoShape: "circle" }));
    for (const value of occlusion.opacities) {
      expect([0, 1]).toContain(value);
    }
    // 1 px outside the circle: inside the one-module frame
    expect(Render.opacityAt(occlusion, 14, 17)).toBe(0);
    // 11 px outside: past the frame
    expect(Render.opacityAt(occlusion, 14, 18)).toBe(1);
  });

  it("leaves modules outside the planned box at full opacity", () => {
    const occlusion = planFor(v3, styleWith({ modulePixelSize: 10, logoSizeRatio: 0.2 }));
    expect(Render.opacityAt(occlusion, 0, 0)).toBe(1);
    expect(Render.opacityAt(occlusion, 28, 28)).toBe(1);
    expect(Render.opacityAt(occlusion, 14, 0)).toBe(1);
  });

  it("treats a missing plan as full opacity", () => {
    expect(Render.opacityAt(null, 14, 14)).toBe(1);
  });

  it("sizes the opacity buffer to the box", () => {
    const occlusion = planFor(v3, styleWith({ modulePixelSize: 10, logoSizeRatio: 0.2, logoShape: "circle" }));
    expect(occlusion.box).toEqual(occlusion.region.moduleBox);
    expect(occlusion.opacities).toHaveLength(Render.boxArea(occlusion.box));
  });
});

describe("Render.plan() — halo", () => {
  // Version 1, no quiet zone, 8 px modules: center 84. A 16/105 ratio gives a
  // 25.6 px square (half side 12.8) with a 6.4 px halo. Module (10, 12) sits
  // at x = 100, 3.2 px outside: the middle of the halo.
  const v1 = blankMatrix(1, 0);
  const style = styleWith({
    modulePixelSize: 8,
    logoSizeRatio: 16 / 105,
    logoShape: "square",
    logoBackgroundStyle: "gradient-halo",
  });

  it("draws a module halfway through the halo at half opacity", () => {
    const occlusion = planFor(v1, style);
    expect(Render.opacityAt(occlusion, 10, 12)).toBeCloseTo(0.5, 9);
  });

  it("is monotonic moving away from the logo", () => {
    const occlusion = planFor(v1, style);
    let previous = 0;
    for (let col = 10; col < v1.size; col++) {
      const value = Render.opacityAt(occlusion, 10, col);
      expect(value).toBeGreaterThanOrEqual(previous);
      previous = value;
    }
    expect(previous).toBe(1);
  });

  it("gives radial-gradient the same module opacities as gradient-halo", () => {
    const halo = planFor(v1, style);
    const radial = planFor(v1, { ...style, logoBackgroundStyle: "radial-gradient" });
    expect(Array.from(radial.opacities)).toEqual(Array.from(halo.opacities));
  });

  it("is deterministic", () => {
    expect(Array.from(planFor(v1, style).opacities)).toEqual(Array.from(planFor(v1, style).opacities));
  });
});
