// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { EncodeOptions, ErrorCorrectionLevel, ModuleMatrix } from "./qr/types.js";
import type {
  Bitmap,
  ComposeOptions,
  LogoAsset,
  LogoRegion,
  RenderWarning,
  StyleAdjustment,
  StyleConfig,
  StyleInput,
} from "./render/types.js";
import { encode } from "./qr/encode.js";
import { resolveStyle } from "./render/style.js";
import { compose } from "./render/compose.js";
import { encodePng } from "./image/png.js";

/**
 * Options for generating a styled QR code.
 */
export interface GenerateOptions extends EncodeOptions, ComposeOptions {
  /** Text or URL to encode */
  data: string;
  /** Colors, sizes and logo styling */
  style?: StyleInput;
  /** Decoded logo to place at the center */
  logo?: LogoAsset | null;
}

/** Symbol parameters the encoder settled on. */
export interface SymbolDetails {
  version: number;
  /** Modules per side */
  size: number;
  errorCorrectionLevel: ErrorCorrectionLevel;
  mask: number;
  /** Output image side in pixels */
  pixels: number;
}

export interface GenerateResult {
  bitmap: Bitmap;
  matrix: ModuleMatrix;
  style: StyleConfig;
  region: LogoRegion | null;
  details: SymbolDetails;
  /** Style values that were clamped to design limits */
  adjustments: StyleAdjustment[];
  warnings: RenderWarning[];
}

export interface GeneratePngResult extends GenerateResult {
  png: Buffer;
  /** `data:image/png;base64,...` */
  dataUri: string;
}

/**
 * Encode text and render it as a styled QR bitmap.
 *
 * @example
 * ```ts
 * const result = generate({
 *   data: "https://example.com",
 *   style: { moduleColor: "#0b3d91", logoShape: "circle", logoBackgroundStyle: "gradient-halo" },
 *   logo: await decodeImage(readFileSync("logo.jpg")),
 * });
 * // result.details.errorCorrectionLevel → "H"
 * ```
 */
export function generate(options: GenerateOptions): GenerateResult {
  const { data, style: styleInput, logo = null, ...rest } = options;

  const { style, adjustments } = resolveStyle(styleInput);
  const matrix = encode(data, rest);
  const composite = compose(matrix, style, logo, rest);

  return {
    bitmap: composite.bitmap,
    matrix,
    style,
    region: composite.region,
    details: {
      version: matrix.version,
      size: matrix.size,
      errorCorrectionLevel: matrix.errorCorrectionLevel ?? rest.errorCorrectionLevel ?? "H",
      mask: matrix.maskId,
      pixels: composite.bitmap.width,
    },
    adjustments,
    warnings: composite.warnings,
  };
}

/**
 * Like {@link generate}, with the bitmap also encoded as PNG.
 */
export function generatePng(options: GenerateOptions): GeneratePngResult {
  const result = generate(options);
  const png = encodePng(result.bitmap);
  return {
    ...result,
    png,
    dataUri: `data:image/png;base64,${png.toString("base64")}`,
  };
}
