// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
export { createRenderHandler, parseRenderBody } from "./handler.js";
export type {
  RenderHandlerConfig,
  RenderRequestBody,
  RenderEvent,
  CorsConfig,
  HandlerRequest,
  HandlerResponse,
} from "./types.js";
