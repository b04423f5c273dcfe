// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Jimp, ResizeStrategy } from "jimp";
import type { LogoAsset } from "./types.js";
import { ValidationError } from "../errors.js";

/**
 * Wrap raw RGBA pixels as a logo, checking that the buffer matches the size.
 */
export function createLogoAsset(width: number, height: number, data: Uint8Array): LogoAsset {
  if (!Number.isInteger(width) || width < 1 || !Number.isInteger(height) || height < 1) {
    throw new ValidationError(`logo dimensions must be positive integers, got ${width}×${height}`);
  }
  if (data.length !== width * height * 4) {
    throw new ValidationError(
      `logo data has ${data.length} bytes, expected ${width * height * 4} for ${width}×${height} RGBA`,
    );
  }
  return Object.freeze({ width, height, data });
}

/**
 * Largest size with the logo's aspect ratio that fits a `box × box` square.
 * Both sides are at least one pixel.
 */
export function fitDimensions(logo: LogoAsset, box: number): { width: number; height: number } {
  const longest = Math.max(logo.width, logo.height);
  return {
    width: Math.max(1, Math.round((box * logo.width) / longest)),
    height: Math.max(1, Math.round((box * logo.height) / longest)),
  };
}

/**
 * Scale a logo to `width × height` with jimp.
 *
 * Enlarging uses nearest-neighbor so flat artwork stays crisp; shrinking uses
 * jimp's default resampler, which averages the pixels it drops.
 */
export function scaleLogo(logo: LogoAsset, width: number, height: number): LogoAsset {
  if (width === logo.width && height === logo.height) {
    return logo;
  }

  const image = Jimp.fromBitmap({ width: logo.width, height: logo.height, data: Buffer.from(logo.data) });
  if (width >= logo.width && height >= logo.height) {
    image.resize({ w: width, h: height, mode: ResizeStrategy.NEAREST_NEIGHBOR });
  } else {
    image.resize({ w: width, h: height });
  }

  return createLogoAsset(image.bitmap.width, image.bitmap.height, new Uint8Array(image.bitmap.data));
}
