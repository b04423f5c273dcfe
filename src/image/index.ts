// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { decodePng, encodePng, toDataUri } from "./png.js";
export { decodeImage, readImageHeader } from "./decode.js";
export type { ImageFormat, ImageHeader, DecodeImageOptions } from "./decode.js";
