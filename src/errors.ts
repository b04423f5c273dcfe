// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ErrorCorrectionLevel } from "./qr/types.js";

/**
 * Base error class for all haloqr errors.
 */
export class HaloQrError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HaloQrError";
    Object.setPrototypeOf(this, HaloQrError.prototype);
  }
}

/**
 * Error thrown when caller-supplied options fail validation.
 */
export class ValidationError extends HaloQrError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

/**
 * Error thrown when encoder output is not a usable module matrix.
 */
export class InvalidMatrixError extends HaloQrError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidMatrixError";
    Object.setPrototypeOf(this, InvalidMatrixError.prototype);
  }
}

/**
 * Error thrown when a color string is not a hex RGB triple.
 */
export class InvalidColorError extends HaloQrError {
  readonly value: string;
  readonly field?: string;

  constructor(message: string, value: string, field?: string) {
    super(message);
    this.name = "InvalidColorError";
    this.value = value;
    this.field = field;
    Object.setPrototypeOf(this, InvalidColorError.prototype);
  }
}

/**
 * Error thrown when a numeric or enum style field is out of range.
 */
export class InvalidStyleError extends HaloQrError {
  readonly field: string;

  constructor(message: string, field: string) {
    super(message);
    this.name = "InvalidStyleError";
    this.field = field;
    Object.setPrototypeOf(this, InvalidStyleError.prototype);
  }
}

/**
 * Raised when the logo and its halo cover more of the symbol than the
 * error-correction level can recover.
 *
 * Advisory by default: `compose()` reports it as a warning and keeps rendering
 * unless `onOversizedLogo: "throw"` is set.
 */
export class LogoTooLargeError extends HaloQrError {
  readonly occludedFraction: number;
  readonly threshold: number;
  readonly errorCorrectionLevel: ErrorCorrectionLevel;

  constructor(
    message: string,
    occludedFraction: number,
    threshold: number,
    errorCorrectionLevel: ErrorCorrectionLevel,
  ) {
    super(message);
    this.name = "LogoTooLargeError";
    this.occludedFraction = occludedFraction;
    this.threshold = threshold;
    this.errorCorrectionLevel = errorCorrectionLevel;
    Object.setPrototypeOf(this, LogoTooLargeError.prototype);
  }
}

/**
 * Error thrown when the QR encoder rejects its input.
 */
export class EncodingError extends HaloQrError {
  constructor(message: string) {
    super(message);
    this.name = "EncodingError";
    Object.setPrototypeOf(this, EncodingError.prototype);
  }
}

/**
 * Error thrown when the data does not fit in the allowed version range.
 */
export class DataTooLongError extends EncodingError {
  readonly maxVersion: number;

  constructor(message: string, maxVersion: number) {
    super(message);
    this.name = "DataTooLongError";
    this.maxVersion = maxVersion;
    Object.setPrototypeOf(this, DataTooLongError.prototype);
  }
}

/**
 * Error thrown when an image buffer cannot be decoded.
 */
export class ImageDecodeError extends HaloQrError {
  constructor(message: string) {
    super(message);
    this.name = "ImageDecodeError";
    Object.setPrototypeOf(this, ImageDecodeError.prototype);
  }
}
