// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * haloqr - Styled QR codes with embedded logos
 *
 * Encode text, clear and fade the modules around a centered logo, and
 * rasterize the result at any resolution.
 *
 * @packageDocumentation
 */

// Encoder adapter namespace
export * as QR from "./qr/index.js";

// Compositing engine namespace
export * as Render from "./render/index.js";

// PNG I/O namespace
export * as Png from "./image/index.js";

// One-call generation
export { generate, generatePng } from "./generate.js";
export type { GenerateOptions, GenerateResult, GeneratePngResult, SymbolDetails } from "./generate.js";

// Re-export the core value types at top level for convenience
export type { ModuleMatrix, ErrorCorrectionLevel } from "./qr/types.js";
export type { StyleConfig, StyleInput, LogoAsset, Bitmap, RenderWarning } from "./render/types.js";

// Errors
export {
  HaloQrError,
  ValidationError,
  InvalidMatrixError,
  InvalidColorError,
  InvalidStyleError,
  LogoTooLargeError,
  EncodingError,
  DataTooLongError,
  ImageDecodeError,
} from "./errors.js";
