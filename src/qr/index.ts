// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { encode } from "./encode.js";
export { normalize, totalPixels, isDark } from "./matrix.js";
export { ERROR_CORRECTION_LEVELS, DEFAULT_ENCODE_OPTIONS } from "./types.js";
export type {
  ErrorCorrectionLevel,
  ModuleMatrix,
  RawBitMatrix,
  RawModules,
  RawEncoderOutput,
  EncodeOptions,
} from "./types.js";
