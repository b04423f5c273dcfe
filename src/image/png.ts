// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { PNG } from "pngjs";
import type { Bitmap, LogoAsset } from "../render/types.js";
import { createLogoAsset } from "../render/logo.js";
import { ImageDecodeError } from "../errors.js";

/**
 * Decode a PNG file into an RGBA logo.
 */
export function decodePng(buffer: Uint8Array): LogoAsset {
  let png: PNG;
  try {
    png = PNG.sync.read(Buffer.from(buffer));
  } catch (err) {
    throw new ImageDecodeError(
      `Failed to decode PNG: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return createLogoAsset(png.width, png.height, new Uint8Array(png.data));
}

/**
 * Encode a bitmap (or logo) as a PNG file.
 */
export function encodePng(image: Bitmap | LogoAsset): Buffer {
  const png = new PNG({ width: image.width, height: image.height });
  png.data = Buffer.from(image.data);
  return PNG.sync.write(png);
}

/**
 * Encode a bitmap as a PNG data URI (`data:image/png;base64,...`).
 */
export function toDataUri(image: Bitmap | LogoAsset): string {
  return `data:image/png;base64,${encodePng(image).toString("base64")}`;
}
