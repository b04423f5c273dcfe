// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ModuleMatrix } from "../qr/types.js";
import type { Bitmap, LogoAsset, LogoRegion, OcclusionPlan, RGB, StyleConfig } from "./types.js";
import { totalPixels } from "../qr/matrix.js";
import { signedDistance } from "./geometry.js";
import { opacityAt } from "./occlusion.js";
import { fitDimensions, scaleLogo } from "./logo.js";
import { mix } from "./color.js";
import { ValidationError } from "../errors.js";

/** Largest image side `render()` will allocate, in pixels. */
export const MAX_IMAGE_SIZE = 16384;

/**
 * Rasterize a QR symbol with an optional logo.
 *
 * Paint order: background, radial gradient (radial-gradient style only),
 * modules (faded by `occlusion`), logo clipped to the region shape, border.
 * With `occlusion` and `logo` both null the result is a plain QR code.
 *
 * The function allocates a new bitmap on every call and reads its inputs only,
 * so identical inputs give byte-identical output.
 */
export function render(
  matrix: ModuleMatrix,
  style: StyleConfig,
  occlusion: OcclusionPlan | null,
  logo: LogoAsset | null,
): Bitmap {
  const size = totalPixels(matrix, style.modulePixelSize);
  if (size > MAX_IMAGE_SIZE) {
    throw new ValidationError(
      `Output would be ${size}×${size} px, above the ${MAX_IMAGE_SIZE} px limit. ` +
        "Lower modulePixelSize or quietZone.",
    );
  }
  const canvas = new Canvas(size, size);
  canvas.fill(style.backgroundColor);

  const region = occlusion?.region ?? null;

  if (region !== null && style.logoBackgroundStyle === "radial-gradient") {
    paintRadialGradient(canvas, region, style);
  }

  paintModules(canvas, matrix, style, occlusion);

  if (region !== null && logo !== null) {
    compositeLogo(canvas, region, logo);
  }

  if (region !== null && style.borderWidth > 0) {
    paintBorder(canvas, region, style.borderWidth, style.borderColor);
  }

  return Object.freeze({ width: size, height: size, data: canvas.data });
}

/** Minimal RGBA pixel buffer with an opaque background. */
class Canvas {
  readonly data: Uint8Array;

  constructor(
    readonly width: number,
    readonly height: number,
  ) {
    this.data = new Uint8Array(width * height * 4);
  }

  fill(color: RGB): void {
    for (let i = 0; i < this.data.length; i += 4) {
      this.data[i] = color.r;
      this.data[i + 1] = color.g;
      this.data[i + 2] = color.b;
      this.data[i + 3] = 255;
    }
  }

  get(x: number, y: number): RGB {
    const i = (y * this.width + x) * 4;
    return { r: this.data[i] ?? 0, g: this.data[i + 1] ?? 0, b: this.data[i + 2] ?? 0 };
  }

  set(x: number, y: number, color: RGB): void {
    const i = (y * this.width + x) * 4;
    this.data[i] = color.r;
    this.data[i + 1] = color.g;
    this.data[i + 2] = color.b;
  }

  fillRect(x: number, y: number, w: number, h: number, color: RGB): void {
    for (let py = y; py < y + h; py++) {
      for (let px = x; px < x + w; px++) {
        this.set(px, py, color);
      }
    }
  }

  /** Pixel index range covering [from, to) on one axis, clipped to `limit`. */
  static span(from: number, to: number, limit: number): [number, number] {
    return [Math.max(0, Math.floor(from)), Math.min(limit, Math.ceil(to))];
  }
}

function paintModules(
  canvas: Canvas,
  matrix: ModuleMatrix,
  style: StyleConfig,
  occlusion: OcclusionPlan | null,
): void {
  const m = style.modulePixelSize;
  const color = style.moduleColor;

  for (let row = 0; row < matrix.size; row++) {
    for (let col = 0; col < matrix.size; col++) {
      if (matrix.rows[row]?.[col] !== true) continue;

      const opacity = opacityAt(occlusion, row, col);
      if (opacity <= 0) continue;

      const x = (matrix.quietZone + col) * m;
      const y = (matrix.quietZone + row) * m;

      if (opacity >= 1) {
        canvas.fillRect(x, y, m, m, color);
        continue;
      }

      // Blend against whatever is already there: plain background or the radial tint
      for (let py = y; py < y + m; py++) {
        for (let px = x; px < x + m; px++) {
          canvas.set(px, py, mix(canvas.get(px, py), color, opacity));
        }
      }
    }
  }
}

function paintRadialGradient(canvas: Canvas, region: LogoRegion, style: StyleConfig): void {
  const reach = region.halfExtent + region.haloWidth;
  const [x0, x1] = Canvas.span(region.center.x - reach, region.center.x + reach, canvas.width);
  const [y0, y1] = Canvas.span(region.center.y - reach, region.center.y + reach, canvas.height);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const d = signedDistance(region, x + 0.5, y + 0.5);
      if (d > region.haloWidth) continue;
      const t = Math.max(d, 0) / region.haloWidth;
      canvas.set(x, y, mix(style.moduleColor, style.backgroundColor, t));
    }
  }
}

function compositeLogo(canvas: Canvas, region: LogoRegion, logo: LogoAsset): void {
  const { width, height } = fitDimensions(logo, region.size);
  const fitted = scaleLogo(logo, width, height);
  const left = Math.round(region.center.x - width / 2);
  const top = Math.round(region.center.y - height / 2);
  const src = fitted.data;

  for (let ly = 0; ly < height; ly++) {
    const y = top + ly;
    if (y < 0 || y >= canvas.height) continue;
    for (let lx = 0; lx < width; lx++) {
      const x = left + lx;
      if (x < 0 || x >= canvas.width) continue;
      if (signedDistance(region, x + 0.5, y + 0.5) > 0) continue;

      const i = (ly * width + lx) * 4;
      const alpha = (src[i + 3] ?? 0) / 255;
      if (alpha === 0) continue;

      const logoColor = { r: src[i] ?? 0, g: src[i + 1] ?? 0, b: src[i + 2] ?? 0 };
      // Source-over onto an opaque destination
      canvas.set(x, y, alpha === 1 ? logoColor : mix(canvas.get(x, y), logoColor, alpha));
    }
  }
}

function paintBorder(canvas: Canvas, region: LogoRegion, borderWidth: number, color: RGB): void {
  const reach = region.halfExtent + borderWidth;
  const [x0, x1] = Canvas.span(region.center.x - reach, region.center.x + reach, canvas.width);
  const [y0, y1] = Canvas.span(region.center.y - reach, region.center.y + reach, canvas.height);

  for (let y = y0; y < y1; y++) {
    for (let x = x0; x < x1; x++) {
      const d = signedDistance(region, x + 0.5, y + 0.5);
      if (d > 0 && d <= borderWidth) {
        canvas.set(x, y, color);
      }
    }
  }
}
