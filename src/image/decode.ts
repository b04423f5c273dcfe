// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Jimp } from "jimp";
import type { LogoAsset } from "../render/types.js";
import { createLogoAsset } from "../render/logo.js";
import { ImageDecodeError, ValidationError } from "../errors.js";

export type ImageFormat = "png" | "jpeg";

/** Format and dimensions read from an image header, before any pixel is decoded. */
export interface ImageHeader {
  format: ImageFormat;
  width: number;
  height: number;
}

export interface DecodeImageOptions {
  /** Reject images whose width × height exceeds this, before decoding */
  maxPixels?: number;
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Read the format and size of a PNG or JPEG without decoding it.
 *
 * PNG dimensions come from the IHDR chunk; JPEG dimensions from the first
 * start-of-frame segment.
 */
export function readImageHeader(buffer: Uint8Array): ImageHeader {
  const buf = Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength);

  if (buf.length >= 8 && PNG_SIGNATURE.every((byte, i) => buf[i] === byte)) {
    if (buf.length < 24 || buf.toString("latin1", 12, 16) !== "IHDR") {
      throw new ImageDecodeError("Failed to decode PNG: missing IHDR chunk");
    }
    return { format: "png", width: buf.readUInt32BE(16), height: buf.readUInt32BE(20) };
  }

  if (buf.length >= 2 && buf[0] === 0xff && buf[1] === 0xd8) {
    return { format: "jpeg", ...readJpegSize(buf) };
  }

  throw new ImageDecodeError("Unsupported image format: expected PNG or JPEG");
}

function readJpegSize(buf: Buffer): { width: number; height: number } {
  let offset = 2;
  while (offset < buf.length) {
    if (buf[offset] !== 0xff) {
      throw new ImageDecodeError("Failed to decode JPEG: malformed segment marker");
    }
    // Markers may be padded with any number of 0xFF fill bytes
    while (buf[offset] === 0xff) offset++;
    const marker = buf[offset];
    if (marker === undefined) break;

    // Standalone markers carry no length
    if (marker === 0x01 || (marker >= 0xd0 && marker <= 0xd7)) {
      offset++;
      continue;
    }
    if (marker === 0xd9 || marker === 0xda) break;
    if (offset + 3 > buf.length) break;

    const length = buf.readUInt16BE(offset + 1);
    const isFrame = marker >= 0xc0 && marker <= 0xcf && marker !== 0xc4 && marker !== 0xc8 && marker !== 0xcc;
    if (isFrame) {
      if (offset + 8 > buf.length) break;
      return { height: buf.readUInt16BE(offset + 4), width: buf.readUInt16BE(offset + 6) };
    }
    offset += 1 + length;
  }
  throw new ImageDecodeError("Failed to decode JPEG: no frame header found");
}

/**
 * Decode a PNG or JPEG logo into RGBA pixels with jimp.
 *
 * The header is checked against `maxPixels` first, so an oversized image is
 * rejected without allocating its pixel buffer.
 *
 * @example
 * ```ts
 * const logo = await decodeImage(readFileSync("logo.jpg"), { maxPixels: 4_000_000 });
 * ```
 */
export async function decodeImage(buffer: Uint8Array, options: DecodeImageOptions = {}): Promise<LogoAsset> {
  const header = readImageHeader(buffer);
  if (header.width < 1 || header.height < 1) {
    throw new ImageDecodeError(`Failed to decode ${header.format.toUpperCase()}: image has no pixels`);
  }

  const { maxPixels } = options;
  if (maxPixels !== undefined && header.width * header.height > maxPixels) {
    const issue = `logo must not exceed ${maxPixels} pixels, got ${header.width}×${header.height}`;
    throw new ValidationError(`Invalid logo: ${issue}`, [issue]);
  }

  const bitmap = await Jimp.read(Buffer.from(buffer)).then(
    (image) => image.bitmap,
    (err: unknown) => {
      throw new ImageDecodeError(
        `Failed to decode ${header.format.toUpperCase()}: ${err instanceof Error ? err.message : String(err)}`,
      );
    },
  );
  return createLogoAsset(bitmap.width, bitmap.height, new Uint8Array(bitmap.data));
}
