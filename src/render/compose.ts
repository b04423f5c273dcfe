// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ErrorCorrectionLevel, ModuleMatrix } from "../qr/types.js";
import type {
  ComposeOptions,
  CompositeResult,
  LogoAsset,
  RenderWarning,
  StyleConfig,
} from "./types.js";
import { computeLogoRegion, boxArea } from "./geometry.js";
import { plan } from "./occlusion.js";
import { render } from "./raster.js";
import { LogoTooLargeError } from "../errors.js";

/**
 * Largest fraction of modules that may be cleared at each error-correction
 * level, matching the codeword recovery capacity of the QR standard.
 */
export const SAFE_OCCLUSION: Readonly<Record<ErrorCorrectionLevel, number>> = {
  L: 0.07,
  M: 0.15,
  Q: 0.25,
  H: 0.3,
};

// Level assumed when the encoder did not report one (the qrcode package default)
const FALLBACK_LEVEL: ErrorCorrectionLevel = "M";

/**
 * Render a symbol with an optional centered logo.
 *
 * Runs geometry, occlusion planning and rasterization. When the planned box
 * covers more of the symbol than the error-correction level can recover, a
 * `LogoTooLargeError` is raised as a warning (default) or thrown
 * (`onOversizedLogo: "throw"`).
 *
 * @example
 * ```ts
 * const matrix = QR.encode("https://example.com");
 * const { style } = resolveStyle({ logoShape: "circle", logoBackgroundStyle: "gradient-halo" });
 * const { bitmap, warnings } = compose(matrix, style, logo);
 * ```
 */
export function compose(
  matrix: ModuleMatrix,
  style: StyleConfig,
  logo: LogoAsset | null,
  options: ComposeOptions = {},
): CompositeResult {
  const { onOversizedLogo = "warn", onWarning = defaultWarningHandler } = options;

  if (logo === null) {
    return {
      bitmap: render(matrix, style, null, null),
      region: null,
      plan: null,
      occludedFraction: 0,
      warnings: [],
    };
  }

  const region = computeLogoRegion(matrix, style);
  const occlusion = plan(matrix, region, style);
  const occludedFraction = boxArea(region.moduleBox) / (matrix.size * matrix.size);

  const warnings: RenderWarning[] = [];
  const level = matrix.errorCorrectionLevel ?? FALLBACK_LEVEL;
  const threshold = options.safeOcclusion?.[level] ?? SAFE_OCCLUSION[level];

  if (occludedFraction > threshold) {
    const error = new LogoTooLargeError(
      `Logo clears ${formatPercent(occludedFraction)} of the modules; error correction level ${level} ` +
        `recovers about ${formatPercent(threshold)}. Shrink the logo or raise the error correction level.`,
      occludedFraction,
      threshold,
      level,
    );
    if (onOversizedLogo === "throw") {
      throw error;
    }
    warnings.push({ code: "logo-too-large", message: error.message });
  }

  if (matrix.errorCorrectionLevel !== undefined && matrix.errorCorrectionLevel !== "H") {
    warnings.push({
      code: "low-error-correction",
      message: `Using a logo with error correction level ${matrix.errorCorrectionLevel} (below H) may make the code unscannable`,
    });
  }

  for (const warning of warnings) {
    onWarning(warning);
  }

  return {
    bitmap: render(matrix, style, occlusion, logo),
    region,
    plan: occlusion,
    occludedFraction,
    warnings,
  };
}

function defaultWarningHandler(warning: RenderWarning): void {
  console.warn(`[haloqr] ${warning.message}`);
}

function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}
