// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { RGB } from "./types.js";
import { InvalidColorError } from "../errors.js";

const HEX_COLOR = /^#?([0-9a-f]{3}|[0-9a-f]{6})$/i;

/**
 * Parse `#RGB`, `#RRGGBB` (the `#` is optional) into an RGB triple.
 *
 * @param field - Style field name, included in the error for context
 */
export function parseHexColor(value: string, field?: string): RGB {
  const match = typeof value === "string" ? HEX_COLOR.exec(value.trim()) : null;
  if (!match?.[1]) {
    const label = field ? `${field}: ` : "";
    throw new InvalidColorError(
      `${label}"${String(value)}" is not a hex RGB color (expected #RGB or #RRGGBB)`,
      String(value),
      field,
    );
  }

  let hex = match[1];
  if (hex.length === 3) {
    hex = hex.split("").map((ch) => ch + ch).join("");
  }

  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
  };
}

/** Format as lowercase `#rrggbb`. */
export function toHex(color: RGB): string {
  return `#${[color.r, color.g, color.b].map((c) => c.toString(16).padStart(2, "0")).join("")}`;
}

/**
 * Linear interpolation between two colors. `t = 0` gives `from`, `t = 1` gives `to`.
 */
export function mix(from: RGB, to: RGB, t: number): RGB {
  return {
    r: Math.round(from.r + (to.r - from.r) * t),
    g: Math.round(from.g + (to.g - from.g) * t),
    b: Math.round(from.b + (to.b - from.b) * t),
  };
}
