// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { resolveStyle, DEFAULT_STYLE, MAX_LOGO_SIZE_RATIO } from "./style.js";
export { parseHexColor, toHex, mix } from "./color.js";
export {
  computeLogoRegion,
  signedDistance,
  containsPoint,
  moduleCenter,
  boxArea,
  MAX_OCCUPIED_FRACTION,
  CORNER_RADIUS_RATIO,
  HALO_WIDTH_RATIO,
  FRAME_MARGIN_RATIO,
} from "./geometry.js";
export { plan, opacityAt, moduleOpacity, smoothstep } from "./occlusion.js";
export { render, MAX_IMAGE_SIZE } from "./raster.js";
export { createLogoAsset, fitDimensions, scaleLogo } from "./logo.js";
export { compose, SAFE_OCCLUSION } from "./compose.js";
export { LOGO_SHAPES, LOGO_BACKGROUND_STYLES } from "./types.js";
export type {
  RGB,
  LogoShape,
  LogoBackgroundStyle,
  StyleConfig,
  StyleInput,
  StyleAdjustment,
  ResolvedStyle,
  ModuleBox,
  LogoRegion,
  OcclusionPlan,
  LogoAsset,
  Bitmap,
  WarningCode,
  RenderWarning,
  ComposeOptions,
  CompositeResult,
} from "./types.js";
