// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ModuleMatrix } from "../qr/types.js";
import type { LogoBackgroundStyle, LogoRegion, OcclusionPlan, StyleConfig } from "./types.js";
import { moduleCenter, signedDistance } from "./geometry.js";

/**
 * Cubic Hermite easing, `t²(3 − 2t)` on [0, 1]. smoothstep(0.5) = 0.5.
 */
export function smoothstep(t: number): number {
  const x = Math.min(Math.max(t, 0), 1);
  return x * x * (3 - 2 * x);
}

/**
 * Opacity of a module whose center is `d` pixels outside the region boundary.
 */
export function moduleOpacity(
  d: number,
  region: Pick<LogoRegion, "haloWidth" | "frameMargin">,
  backgroundStyle: LogoBackgroundStyle,
): number {
  if (d <= 0) return 0;

  if (backgroundStyle === "solid") {
    return d <= region.frameMargin ? 0 : 1;
  }

  if (d >= region.haloWidth) return 1;
  return smoothstep(d / region.haloWidth);
}

/**
 * Decide how strongly each module around the logo is drawn.
 *
 * Only modules inside `region.moduleBox` are evaluated; everything else keeps
 * opacity 1. Each value depends on its own coordinate alone.
 */
export function plan(matrix: ModuleMatrix, region: LogoRegion, style: StyleConfig): OcclusionPlan {
  const box = region.moduleBox;
  const cols = box.colEnd - box.colStart + 1;
  const rows = box.rowEnd - box.rowStart + 1;
  const opacities = new Float64Array(rows * cols);

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const { x, y } = moduleCenter(matrix, style.modulePixelSize, box.rowStart + r, box.colStart + c);
      const d = signedDistance(region, x, y);
      opacities[r * cols + c] = moduleOpacity(d, region, style.logoBackgroundStyle);
    }
  }

  return Object.freeze({ region, box, opacities });
}

/**
 * Opacity of module (row, col) under `occlusion`; 1 when no plan is given or the
 * module lies outside the planned box.
 */
export function opacityAt(occlusion: OcclusionPlan | null, row: number, col: number): number {
  if (occlusion === null) return 1;
  const { box, opacities } = occlusion;
  if (row < box.rowStart || row > box.rowEnd || col < box.colStart || col > box.colEnd) {
    return 1;
  }
  const cols = box.colEnd - box.colStart + 1;
  return opacities[(row - box.rowStart) * cols + (col - box.colStart)] ?? 1;
}
