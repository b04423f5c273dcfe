// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * QR error-correction level. Recovery capacity is roughly
 * L 7%, M 15%, Q 25%, H 30% of codewords.
 */
export type ErrorCorrectionLevel = "L" | "M" | "Q" | "H";

/** Levels in ascending order of redundancy. */
export const ERROR_CORRECTION_LEVELS: readonly ErrorCorrectionLevel[] = ["L", "M", "Q", "H"];

/**
 * A finalized QR symbol as seen by the renderer.
 *
 * Produced by `normalize()` (or `encode()`), never mutated afterwards.
 */
export interface ModuleMatrix {
  /** Modules per side (N) */
  readonly size: number;
  /** Row-major grid, `true` = dark module */
  readonly rows: ReadonlyArray<ReadonlyArray<boolean>>;
  /** Quiet zone width in modules */
  readonly quietZone: number;
  /** QR version, 1–40 */
  readonly version: number;
  /** Mask pattern chosen by the encoder, 0–7 */
  readonly maskId: number;
  /** Error-correction level the symbol was encoded with, when known */
  readonly errorCorrectionLevel?: ErrorCorrectionLevel;
}

/**
 * Bit-matrix shape exposed by the `qrcode` package (`QRCode.create().modules`).
 */
export interface RawBitMatrix {
  size: number;
  data: ArrayLike<number>;
}

/**
 * Module grid in any of the shapes accepted by `normalize()`.
 */
export type RawModules = ReadonlyArray<ReadonlyArray<boolean | number>> | RawBitMatrix;

/**
 * Encoder output before validation.
 */
export interface RawEncoderOutput {
  modules: RawModules;
  version: number;
  mask: number;
  /** Quiet zone width in modules. Default: 4 */
  quietZone?: number;
  errorCorrectionLevel?: ErrorCorrectionLevel;
}

/**
 * Options for `encode()`.
 */
export interface EncodeOptions {
  /** Minimum error-correction level. Default: "H" */
  errorCorrectionLevel?: ErrorCorrectionLevel;
  /** Smallest version to use. Default: 1 */
  minVersion?: number;
  /** Largest version allowed. Default: 40 */
  maxVersion?: number;
  /** Force a mask pattern (0–7). Omit for automatic selection. */
  mask?: number;
  /** Raise the error-correction level when it does not increase the version. Default: true */
  boostEcl?: boolean;
  /** Quiet zone width in modules. Default: 4 */
  quietZone?: number;
}

export const DEFAULT_ENCODE_OPTIONS = {
  errorCorrectionLevel: "H",
  minVersion: 1,
  maxVersion: 40,
  boostEcl: true,
  quietZone: 4,
} as const satisfies Required<Omit<EncodeOptions, "mask">>;
