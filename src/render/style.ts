// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ResolvedStyle, StyleAdjustment, StyleInput } from "./types.js";
import { LOGO_SHAPES, LOGO_BACKGROUND_STYLES } from "./types.js";
import { parseHexColor } from "./color.js";
import { InvalidStyleError } from "../errors.js";

/** Largest logo width, as a fraction of the symbol, that still scans reliably. */
export const MAX_LOGO_SIZE_RATIO = 0.35;

export const DEFAULT_STYLE = {
  moduleColor: "#000000",
  backgroundColor: "#FFFFFF",
  modulePixelSize: 15,
  logoShape: "square",
  logoBackgroundStyle: "solid",
  logoSizeRatio: 0.25,
  borderWidth: 0,
} as const satisfies Omit<Required<StyleInput>, "borderColor">;

/**
 * Validate user-facing style options and fill in defaults.
 *
 * `logoSizeRatio` above {@link MAX_LOGO_SIZE_RATIO} is clamped rather than
 * rejected; every clamp is listed in `adjustments`.
 *
 * @example
 * ```ts
 * const { style, adjustments } = resolveStyle({ moduleColor: "#1a73e8", logoSizeRatio: 0.4 });
 * // style.logoSizeRatio → 0.35
 * // adjustments[0]      → { field: "logoSizeRatio", requested: 0.4, applied: 0.35, ... }
 * ```
 */
export function resolveStyle(input: StyleInput = {}): ResolvedStyle {
  const adjustments: StyleAdjustment[] = [];

  const moduleColor = parseHexColor(input.moduleColor ?? DEFAULT_STYLE.moduleColor, "moduleColor");
  const backgroundColor = parseHexColor(
    input.backgroundColor ?? DEFAULT_STYLE.backgroundColor,
    "backgroundColor",
  );
  const borderColor = input.borderColor === undefined
    ? moduleColor
    : parseHexColor(input.borderColor, "borderColor");

  const modulePixelSize = input.modulePixelSize ?? DEFAULT_STYLE.modulePixelSize;
  if (!Number.isInteger(modulePixelSize) || modulePixelSize < 1) {
    throw new InvalidStyleError(
      `modulePixelSize must be an integer ≥ 1, got ${String(modulePixelSize)}`,
      "modulePixelSize",
    );
  }

  const logoShape = input.logoShape ?? DEFAULT_STYLE.logoShape;
  if (!LOGO_SHAPES.includes(logoShape)) {
    throw new InvalidStyleError(
      `logoShape must be one of ${LOGO_SHAPES.join(", ")}, got "${String(logoShape)}"`,
      "logoShape",
    );
  }

  const logoBackgroundStyle = input.logoBackgroundStyle ?? DEFAULT_STYLE.logoBackgroundStyle;
  if (!LOGO_BACKGROUND_STYLES.includes(logoBackgroundStyle)) {
    throw new InvalidStyleError(
      `logoBackgroundStyle must be one of ${LOGO_BACKGROUND_STYLES.join(", ")}, got "${String(logoBackgroundStyle)}"`,
      "logoBackgroundStyle",
    );
  }

  let logoSizeRatio = input.logoSizeRatio ?? DEFAULT_STYLE.logoSizeRatio;
  if (!Number.isFinite(logoSizeRatio) || logoSizeRatio <= 0) {
    throw new InvalidStyleError(
      `logoSizeRatio must be greater than 0, got ${String(logoSizeRatio)}`,
      "logoSizeRatio",
    );
  }
  if (logoSizeRatio > MAX_LOGO_SIZE_RATIO) {
    adjustments.push({
      field: "logoSizeRatio",
      requested: logoSizeRatio,
      applied: MAX_LOGO_SIZE_RATIO,
      reason: `logos wider than ${MAX_LOGO_SIZE_RATIO * 100}% of the symbol are not reliably scannable`,
    });
    logoSizeRatio = MAX_LOGO_SIZE_RATIO;
  }

  const borderWidth = input.borderWidth ?? DEFAULT_STYLE.borderWidth;
  if (!Number.isInteger(borderWidth) || borderWidth < 0) {
    throw new InvalidStyleError(
      `borderWidth must be a non-negative integer, got ${String(borderWidth)}`,
      "borderWidth",
    );
  }

  return {
    style: Object.freeze({
      moduleColor,
      backgroundColor,
      modulePixelSize,
      logoShape,
      logoBackgroundStyle,
      logoSizeRatio,
      borderWidth,
      borderColor,
    }),
    adjustments,
  };
}
