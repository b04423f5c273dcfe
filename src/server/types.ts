// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { SymbolDetails } from "../generate.js";
import type { RenderWarning, StyleInput } from "../render/types.js";
import type { ErrorCorrectionLevel } from "../qr/types.js";

/**
 * Framework-agnostic incoming request.
 */
export interface HandlerRequest {
  /** HTTP method (uppercase) */
  method: string;
  /** Path relative to mount point, e.g., "/render" */
  path: string;
  /** Parsed JSON body (for POST requests) */
  body?: unknown;
  /** Request headers (lowercase keys) */
  headers: Record<string, string | undefined>;
}

/**
 * Framework-agnostic outgoing response.
 */
export interface HandlerResponse {
  /** HTTP status code */
  status: number;
  /** Response headers */
  headers: Record<string, string>;
  /** Response body (string for JSON, Uint8Array for PNG) */
  body: string | Uint8Array;
}

/**
 * CORS configuration for the render handler.
 *
 * By default, the handler adds permissive CORS headers to all responses
 * so that browser front ends on other origins can call it.
 * Set `cors: false` to disable, or provide an object to customize.
 */
export interface CorsConfig {
  /** Allowed origin(s). Default: `"*"` */
  origin?: string;
  /** Allowed methods. Default: `"GET, POST, OPTIONS"` */
  methods?: string;
  /** Allowed headers. Default: `"Content-Type"` */
  headers?: string;
}

/**
 * Configuration for the render handler.
 */
export interface RenderHandlerConfig {
  /**
   * Largest output image side, in pixels. Requests that would exceed it are
   * rejected with 400. Default: 4096
   */
  maxImageSize?: number;

  /**
   * Largest accepted logo file, in bytes after base64 decoding. Default: 2 MiB
   */
  maxLogoBytes?: number;

  /**
   * Largest accepted logo, in pixels (width × height), checked from the image
   * header before decoding. Default: 4 000 000
   */
  maxLogoPixels?: number;

  /**
   * Optional callback invoked after each successful render.
   * Useful for logging or metrics.
   */
  onRender?: (event: RenderEvent) => void | Promise<void>;

  /**
   * CORS configuration. Defaults to permissive headers (`Access-Control-Allow-Origin: *`).
   * Set to `false` to disable CORS headers entirely.
   */
  cors?: CorsConfig | false;
}

/**
 * JSON body accepted by `POST /render`, as returned by `parseRenderBody()`.
 */
export interface RenderRequestBody {
  data: string;
  errorCorrectionLevel?: ErrorCorrectionLevel;
  minVersion?: number;
  maxVersion?: number;
  mask?: number;
  boostEcl?: boolean;
  quietZone?: number;
  /** Reject oversized logos with 422 instead of warning. Default: false */
  strict?: boolean;
  style?: StyleInput;
  /**
   * Base64-encoded PNG or JPEG. A `data:image/png;base64,` or
   * `data:image/jpeg;base64,` prefix is allowed and stripped by `parseRenderBody()`.
   */
  logo?: string;
}

/**
 * Event emitted after each successful render.
 */
export interface RenderEvent {
  details: SymbolDetails;
  hasLogo: boolean;
  warnings: RenderWarning[];
  /** Time spent encoding and rendering, in milliseconds */
  durationMs: number;
  timestamp: Date;
}
