// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import QRCode from "qrcode";
import type { EncodeOptions, ErrorCorrectionLevel, ModuleMatrix } from "./types.js";
import { DEFAULT_ENCODE_OPTIONS, ERROR_CORRECTION_LEVELS } from "./types.js";
import { normalize } from "./matrix.js";
import { ValidationError, EncodingError, DataTooLongError } from "../errors.js";

type MaskPattern = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

type QrSymbol = ReturnType<typeof QRCode.create>;

// `ErrorCorrectionLevel.bit` values used inside the qrcode package
const ECL_BY_BIT: Record<number, ErrorCorrectionLevel> = { 1: "L", 0: "M", 3: "Q", 2: "H" };

/**
 * Encode text into a finalized QR module matrix.
 *
 * Picks the smallest version in `[minVersion, maxVersion]` that holds the data
 * at the requested error-correction level. With `boostEcl` the level is then
 * raised as far as it goes without growing the symbol.
 *
 * @example
 * ```ts
 * const matrix = encode("https://example.com", { errorCorrectionLevel: "M" });
 * // matrix.errorCorrectionLevel is "H" when that still fits the same version
 * ```
 */
export function encode(data: string, options: EncodeOptions = {}): ModuleMatrix {
  const {
    errorCorrectionLevel = DEFAULT_ENCODE_OPTIONS.errorCorrectionLevel,
    minVersion = DEFAULT_ENCODE_OPTIONS.minVersion,
    maxVersion = DEFAULT_ENCODE_OPTIONS.maxVersion,
    boostEcl = DEFAULT_ENCODE_OPTIONS.boostEcl,
    quietZone = DEFAULT_ENCODE_OPTIONS.quietZone,
    mask,
  } = options;

  const issues = validateEncodeOptions(data, { errorCorrectionLevel, minVersion, maxVersion, mask });
  if (issues.length > 0) {
    throw new ValidationError(`Invalid encode options: ${issues.join("; ")}`, issues);
  }

  const maskPattern = mask === undefined ? undefined : toMaskPattern(mask);

  const smallest = tryCreate(data, errorCorrectionLevel, undefined, maskPattern);
  if (smallest === null || smallest.version > maxVersion) {
    throw new DataTooLongError(
      `Data is too long for a QR code of version ${maxVersion} or lower at error correction level ${errorCorrectionLevel}`,
      maxVersion,
    );
  }

  let symbol: QrSymbol = smallest;
  if (symbol.version < minVersion) {
    symbol = requireSymbol(tryCreate(data, errorCorrectionLevel, minVersion, maskPattern), minVersion);
  }

  let level = errorCorrectionLevel;
  if (boostEcl) {
    for (const higher of ERROR_CORRECTION_LEVELS.slice(ERROR_CORRECTION_LEVELS.indexOf(level) + 1)) {
      const boosted = tryCreate(data, higher, symbol.version, maskPattern);
      if (boosted === null) break;
      symbol = boosted;
      level = higher;
    }
  }

  return normalize({
    modules: symbol.modules,
    version: symbol.version,
    mask: symbol.maskPattern ?? maskPattern ?? -1,
    quietZone,
    errorCorrectionLevel: ECL_BY_BIT[symbol.errorCorrectionLevel.bit] ?? level,
  });
}

function validateEncodeOptions(
  data: string,
  opts: { errorCorrectionLevel: string; minVersion: number; maxVersion: number; mask?: number },
): string[] {
  const issues: string[] = [];
  if (typeof data !== "string" || data.length === 0) {
    issues.push("data must be a non-empty string");
  }
  if (!ERROR_CORRECTION_LEVELS.some((l) => l === opts.errorCorrectionLevel)) {
    issues.push(`errorCorrectionLevel must be one of L, M, Q, H, got "${opts.errorCorrectionLevel}"`);
  }
  if (!isVersion(opts.minVersion)) {
    issues.push(`minVersion must be an integer from 1 to 40, got ${opts.minVersion}`);
  }
  if (!isVersion(opts.maxVersion)) {
    issues.push(`maxVersion must be an integer from 1 to 40, got ${opts.maxVersion}`);
  }
  if (isVersion(opts.minVersion) && isVersion(opts.maxVersion) && opts.minVersion > opts.maxVersion) {
    issues.push(`minVersion (${opts.minVersion}) must not exceed maxVersion (${opts.maxVersion})`);
  }
  if (opts.mask !== undefined && (!Number.isInteger(opts.mask) || opts.mask < 0 || opts.mask > 7)) {
    issues.push(`mask must be an integer from 0 to 7, got ${opts.mask}`);
  }
  return issues;
}

function isVersion(v: number): boolean {
  return Number.isInteger(v) && v >= 1 && v <= 40;
}

function toMaskPattern(mask: number): MaskPattern {
  switch (mask) {
    case 0: return 0;
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    case 6: return 6;
    default: return 7;
  }
}

/**
 * Run the encoder. Returns null when the data does not fit the requested
 * version (or any version, when none is given).
 */
function tryCreate(
  data: string,
  level: ErrorCorrectionLevel,
  version: number | undefined,
  maskPattern: MaskPattern | undefined,
): QrSymbol | null {
  try {
    return QRCode.create(data, {
      errorCorrectionLevel: level,
      ...(version !== undefined ? { version } : {}),
      ...(maskPattern !== undefined ? { maskPattern } : {}),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    if (/amount of data|cannot contain/i.test(message)) {
      return null;
    }
    throw new EncodingError(`QR encoding failed: ${message}`);
  }
}

function requireSymbol(symbol: QrSymbol | null, version: number): QrSymbol {
  if (symbol === null) {
    throw new EncodingError(`QR encoding failed: data does not fit version ${version}`);
  }
  return symbol;
}
