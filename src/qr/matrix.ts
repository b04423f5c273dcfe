// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ModuleMatrix, RawEncoderOutput, RawModules, RawBitMatrix } from "./types.js";
import { ERROR_CORRECTION_LEVELS } from "./types.js";
import { InvalidMatrixError } from "../errors.js";

const DEFAULT_QUIET_ZONE = 4;

/**
 * Validate encoder output and wrap it as an immutable `ModuleMatrix`.
 *
 * Accepts either an array of rows or the `{ size, data }` bit matrix that
 * `QRCode.create()` returns. The symbol must be square, non-empty and sized
 * `4 * version + 17`.
 *
 * @example
 * ```ts
 * const qr = QRCode.create("https://example.com", { errorCorrectionLevel: "H" });
 * const matrix = normalize({
 *   modules: qr.modules,
 *   version: qr.version,
 *   mask: qr.maskPattern ?? 0,
 * });
 * ```
 */
export function normalize(raw: RawEncoderOutput): ModuleMatrix {
  if (!raw || typeof raw !== "object") {
    throw new InvalidMatrixError("encoder output is required");
  }
  if (!raw.modules || typeof raw.modules !== "object") {
    throw new InvalidMatrixError("encoder output has no modules");
  }

  const rows = toRows(raw.modules);
  const size = rows.length;

  const { version, mask } = raw;
  if (!Number.isInteger(version) || version < 1 || version > 40) {
    throw new InvalidMatrixError(`version must be an integer from 1 to 40, got ${String(version)}`);
  }
  if (size !== version * 4 + 17) {
    throw new InvalidMatrixError(
      `version ${version} requires ${version * 4 + 17}×${version * 4 + 17} modules, got ${size}×${size}`,
    );
  }
  if (!Number.isInteger(mask) || mask < 0 || mask > 7) {
    throw new InvalidMatrixError(`mask must be an integer from 0 to 7, got ${String(mask)}`);
  }

  const quietZone = raw.quietZone ?? DEFAULT_QUIET_ZONE;
  if (!Number.isInteger(quietZone) || quietZone < 0) {
    throw new InvalidMatrixError(`quietZone must be a non-negative integer, got ${String(quietZone)}`);
  }

  const ecl = raw.errorCorrectionLevel;
  if (ecl !== undefined && !ERROR_CORRECTION_LEVELS.includes(ecl)) {
    throw new InvalidMatrixError(`unknown error correction level "${String(ecl)}"`);
  }

  return Object.freeze({
    size,
    rows: Object.freeze(rows.map((row) => Object.freeze(row))),
    quietZone,
    version,
    maskId: mask,
    ...(ecl !== undefined ? { errorCorrectionLevel: ecl } : {}),
  });
}

/**
 * Side length in pixels of the rendered image, quiet zone included.
 */
export function totalPixels(matrix: ModuleMatrix, modulePixelSize: number): number {
  return (matrix.size + 2 * matrix.quietZone) * modulePixelSize;
}

/** Whether the module at (row, col) is dark. Out-of-range coordinates are light. */
export function isDark(matrix: ModuleMatrix, row: number, col: number): boolean {
  return matrix.rows[row]?.[col] === true;
}

function toRows(modules: RawModules): boolean[][] {
  if (isBitMatrix(modules)) {
    const { size, data } = modules;
    if (!Number.isInteger(size) || size <= 0) {
      throw new InvalidMatrixError(`matrix size must be a positive integer, got ${String(size)}`);
    }
    if (data.length !== size * size) {
      throw new InvalidMatrixError(
        `matrix data has ${data.length} cells, expected ${size * size} for size ${size}`,
      );
    }
    const rows: boolean[][] = [];
    for (let r = 0; r < size; r++) {
      const row: boolean[] = [];
      for (let c = 0; c < size; c++) {
        row.push(data[r * size + c] !== 0);
      }
      rows.push(row);
    }
    return rows;
  }

  if (modules.length === 0) {
    throw new InvalidMatrixError("matrix must be a non-empty array of rows");
  }

  const size = modules.length;
  return modules.map((row, r) => {
    if (row.length !== size) {
      throw new InvalidMatrixError(
        `matrix is not square: row ${r} has ${row.length} cells, expected ${size}`,
      );
    }
    return row.map((cell) => cell === true || cell === 1);
  });
}

function isBitMatrix(modules: RawModules): modules is RawBitMatrix {
  return typeof modules === "object" && modules !== null && "data" in modules;
}
