// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { ErrorCorrectionLevel } from "../qr/types.js";

/** 8-bit RGB color. */
export interface RGB {
  r: number;
  g: number;
  b: number;
}

export type LogoShape = "square" | "circle" | "rounded-rect";

export const LOGO_SHAPES: readonly LogoShape[] = ["square", "circle", "rounded-rect"];

/**
 * How the area around the logo is cleared.
 *
 * - `solid` — modules inside a fixed frame around the logo are removed outright
 * - `gradient-halo` — modules fade in smoothly over the halo width
 * - `radial-gradient` — as `gradient-halo`, with the background tinted from the
 *   module color at the logo edge to the background color at the halo edge
 */
export type LogoBackgroundStyle = "solid" | "gradient-halo" | "radial-gradient";

export const LOGO_BACKGROUND_STYLES: readonly LogoBackgroundStyle[] = [
  "solid",
  "gradient-halo",
  "radial-gradient",
];

/**
 * Fully resolved rendering style. Build one with `resolveStyle()`.
 */
export interface StyleConfig {
  readonly moduleColor: RGB;
  readonly backgroundColor: RGB;
  /** Pixels per module side (integer ≥ 1) */
  readonly modulePixelSize: number;
  readonly logoShape: LogoShape;
  readonly logoBackgroundStyle: LogoBackgroundStyle;
  /** Logo width as a fraction of the symbol width (quiet zone excluded), in (0, 0.35] */
  readonly logoSizeRatio: number;
  /** Border stroke around the logo, in pixels (0 = none) */
  readonly borderWidth: number;
  readonly borderColor: RGB;
}

/**
 * User-facing style fields. Colors are hex strings; everything is optional.
 */
export interface StyleInput {
  /** Module color, e.g. "#000000". Default: black */
  moduleColor?: string;
  /** Background color. Default: white */
  backgroundColor?: string;
  /** Pixels per module. Default: 15 */
  modulePixelSize?: number;
  /** Default: "square" */
  logoShape?: LogoShape;
  /** Default: "solid" */
  logoBackgroundStyle?: LogoBackgroundStyle;
  /** Default: 0.25. Values above 0.35 are clamped. */
  logoSizeRatio?: number;
  /** Default: 0 */
  borderWidth?: number;
  /** Default: the module color */
  borderColor?: string;
}

/**
 * A style value that was changed to stay inside a design limit.
 */
export interface StyleAdjustment {
  field: keyof StyleInput;
  requested: number;
  applied: number;
  reason: string;
}

export interface ResolvedStyle {
  style: StyleConfig;
  adjustments: StyleAdjustment[];
}

/** Inclusive rectangle of module indices. */
export interface ModuleBox {
  rowStart: number;
  rowEnd: number;
  colStart: number;
  colEnd: number;
}

/**
 * Logo placement in pixel space, plus the module rectangle it influences.
 */
export interface LogoRegion {
  readonly shape: LogoShape;
  /** Center in pixels (same on both axes) */
  readonly center: { x: number; y: number };
  /** Diameter (circle) or side length (square, rounded-rect), in pixels */
  readonly size: number;
  /** Radius (circle) or half side (square, rounded-rect) */
  readonly halfExtent: number;
  /** Corner radius; 0 except for rounded-rect */
  readonly cornerRadius: number;
  /** Width of the fading zone for gradient styles (0.25 × size) */
  readonly haloWidth: number;
  /** Width of the cleared frame for the solid style (max(1 module, 0.1 × size)) */
  readonly frameMargin: number;
  /** Distance beyond the boundary within which modules are affected */
  readonly influence: number;
  /** Modules the planner must visit */
  readonly moduleBox: ModuleBox;
  /** True when the requested size was reduced to stay inside the occlusion cap */
  readonly clamped: boolean;
}

/**
 * Per-module opacity for one render. 1 = drawn as-is, 0 = removed.
 */
export interface OcclusionPlan {
  readonly region: LogoRegion;
  readonly box: ModuleBox;
  /** Row-major opacities for `box` only */
  readonly opacities: Float64Array;
}

/**
 * Decoded logo image, RGBA, 4 bytes per pixel.
 */
export interface LogoAsset {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

/**
 * Rendered RGBA image. Alpha is always 255.
 */
export interface Bitmap {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export type WarningCode = "logo-too-large" | "low-error-correction";

export interface RenderWarning {
  code: WarningCode;
  message: string;
}

/**
 * Options for `compose()`.
 */
export interface ComposeOptions {
  /**
   * What to do when the cleared area exceeds the safe occlusion budget.
   * Default: "warn" (report and keep rendering)
   */
  onOversizedLogo?: "warn" | "throw";
  /** Override the safe occlusion fraction per error-correction level */
  safeOcclusion?: Partial<Record<ErrorCorrectionLevel, number>>;
  /** Receives each warning. Default: `console.warn` */
  onWarning?: (warning: RenderWarning) => void;
}

export interface CompositeResult {
  bitmap: Bitmap;
  /** Null when no logo was supplied */
  region: LogoRegion | null;
  plan: OcclusionPlan | null;
  /** Fraction of the symbol's modules inside the planned box */
  occludedFraction: number;
  warnings: RenderWarning[];
}
