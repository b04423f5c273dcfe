// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ModuleMatrix } from "../qr/types.js";
import type { LogoRegion, LogoShape, ModuleBox, StyleConfig } from "./types.js";

/**
 * Upper bound on the logo's area, as a fraction of the symbol's modules.
 * Matches the recovery capacity of error-correction level H.
 */
export const MAX_OCCUPIED_FRACTION = 0.3;

/** Corner radius of a rounded-rect logo, relative to its side. */
export const CORNER_RADIUS_RATIO = 0.15;

/** Width of the gradient halo, relative to the region size. */
export const HALO_WIDTH_RATIO = 0.25;

/** Width of the solid frame, relative to the region size (at least one module). */
export const FRAME_MARGIN_RATIO = 0.1;

/**
 * Place the logo region at the center of the symbol.
 *
 * The region's size is `logoSizeRatio` of the symbol width (quiet zone
 * excluded). If that would cover more than {@link MAX_OCCUPIED_FRACTION} of
 * the modules the size is reduced and `clamped` is set.
 */
export function computeLogoRegion(matrix: ModuleMatrix, style: StyleConfig): LogoRegion {
  const m = style.modulePixelSize;
  const symbolPixels = matrix.size * m;
  const offset = matrix.quietZone * m;
  const center = offset + symbolPixels / 2;

  const requested = style.logoSizeRatio * symbolPixels;
  const maxArea = MAX_OCCUPIED_FRACTION * matrix.size * matrix.size * m * m;
  const areaFactor = style.logoShape === "circle" ? Math.PI / 4 : 1;
  const maxSize = Math.sqrt(maxArea / areaFactor);
  const clamped = requested > maxSize;
  const size = clamped ? maxSize : requested;

  const halfExtent = size / 2;
  const cornerRadius = style.logoShape === "rounded-rect" ? size * CORNER_RADIUS_RATIO : 0;
  const haloWidth = size * HALO_WIDTH_RATIO;
  const frameMargin = Math.max(m, size * FRAME_MARGIN_RATIO);
  const influence = style.logoBackgroundStyle === "solid" ? frameMargin : haloWidth;

  return Object.freeze({
    shape: style.logoShape,
    center: Object.freeze({ x: center, y: center }),
    size,
    halfExtent,
    cornerRadius,
    haloWidth,
    frameMargin,
    influence,
    moduleBox: Object.freeze(boxAround(center, halfExtent + influence, offset, m, matrix.size)),
    clamped,
  });
}

/**
 * Signed distance in pixels from (x, y) to the region boundary.
 * Negative inside, positive outside.
 *
 * Circle uses Euclidean distance, square the Chebyshev distance to the box,
 * rounded-rect the rounded-box distance (straight edges behave like the
 * square, corners like a circle of `cornerRadius`).
 */
export function signedDistance(region: LogoRegion, x: number, y: number): number {
  const dx = Math.abs(x - region.center.x);
  const dy = Math.abs(y - region.center.y);
  return shapeDistance(region.shape, dx, dy, region.halfExtent, region.cornerRadius);
}

function shapeDistance(
  shape: LogoShape,
  dx: number,
  dy: number,
  halfExtent: number,
  cornerRadius: number,
): number {
  switch (shape) {
    case "circle":
      return Math.hypot(dx, dy) - halfExtent;
    case "square":
      return Math.max(dx, dy) - halfExtent;
    case "rounded-rect": {
      const inner = halfExtent - cornerRadius;
      const qx = dx - inner;
      const qy = dy - inner;
      const outside = Math.hypot(Math.max(qx, 0), Math.max(qy, 0));
      const inside = Math.min(Math.max(qx, qy), 0);
      return outside + inside - cornerRadius;
    }
  }
}

/** Whether (x, y) lies inside or on the region boundary. */
export function containsPoint(region: LogoRegion, x: number, y: number): boolean {
  return signedDistance(region, x, y) <= 0;
}

/** Pixel-space center of module (row, col). */
export function moduleCenter(
  matrix: ModuleMatrix,
  modulePixelSize: number,
  row: number,
  col: number,
): { x: number; y: number } {
  return {
    x: (matrix.quietZone + col + 0.5) * modulePixelSize,
    y: (matrix.quietZone + row + 0.5) * modulePixelSize,
  };
}

/**
 * Smallest module rectangle covering the square [center ± reach] on both axes,
 * clamped to the matrix.
 */
function boxAround(
  center: number,
  reach: number,
  offset: number,
  modulePixelSize: number,
  size: number,
): ModuleBox {
  const first = clampIndex(Math.floor((center - reach - offset) / modulePixelSize), size);
  const last = clampIndex(Math.ceil((center + reach - offset) / modulePixelSize) - 1, size);
  return { rowStart: first, rowEnd: last, colStart: first, colEnd: last };
}

function clampIndex(i: number, size: number): number {
  return Math.min(Math.max(i, 0), size - 1);
}

/** Number of modules in an inclusive box. */
export function boxArea(box: ModuleBox): number {
  return (box.rowEnd - box.rowStart + 1) * (box.colEnd - box.colStart + 1);
}
