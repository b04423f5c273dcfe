// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type {
  HandlerRequest,
  HandlerResponse,
  RenderHandlerConfig,
  RenderRequestBody,
  CorsConfig,
} from "./types.js";
import type { StyleInput } from "../render/types.js";
import { LOGO_SHAPES, LOGO_BACKGROUND_STYLES } from "../render/types.js";
import { ERROR_CORRECTION_LEVELS } from "../qr/types.js";
import { encode } from "../qr/encode.js";
import { totalPixels } from "../qr/matrix.js";
import { resolveStyle } from "../render/style.js";
import { compose } from "../render/compose.js";
import { encodePng } from "../image/png.js";
import { decodeImage } from "../image/decode.js";
import {
  HaloQrError,
  DataTooLongError,
  LogoTooLargeError,
  ValidationError,
} from "../errors.js";

const DEFAULT_MAX_IMAGE_SIZE = 4096;
const DEFAULT_MAX_LOGO_BYTES = 2 * 1024 * 1024;
const DEFAULT_MAX_LOGO_PIXELS = 4_000_000;
const LOGO_DATA_URI_PREFIX = /^data:image\/(?:png|jpe?g);base64,/;

/**
 * Create a framework-agnostic QR render handler.
 *
 * Returns an async function that processes incoming requests and returns
 * responses. Routes:
 *
 * - `POST /render` — Encode `data` and return the styled QR code as `image/png`
 * - `GET /health` — Liveness probe
 *
 * Symbol details are returned in `x-qr-version`, `x-qr-size`, `x-qr-ecl` and
 * `x-qr-mask` headers; advisory warning codes in `x-qr-warnings`.
 *
 * Framework adapters (Express) and the `serve` command translate their native
 * request/response types to/from `HandlerRequest`/`HandlerResponse`.
 *
 * @example
 * ```ts
 * const handle = createRenderHandler();
 * const response = await handle({
 *   method: "POST",
 *   path: "/render",
 *   body: { data: "https://example.com", style: { moduleColor: "#0b3d91" } },
 *   headers: { "content-type": "application/json" },
 * });
 * ```
 */
export function createRenderHandler(
  config: RenderHandlerConfig = {},
): (req: HandlerRequest) => Promise<HandlerResponse> {
  const corsHeaders = resolveCorsHeaders(config.cors);

  return async (req: HandlerRequest): Promise<HandlerResponse> => {
    // Handle CORS preflight
    if (req.method === "OPTIONS") {
      return {
        status: 204,
        headers: { ...corsHeaders },
        body: "",
      };
    }

    const path = req.path.replace(/^\/+/, "").replace(/\/+$/, "");

    let response: HandlerResponse;

    if (path === "render" && req.method === "POST") {
      response = await handleRender(req, config);
    } else if (path === "health" && req.method === "GET") {
      response = jsonResponse(200, { status: "ok" });
    } else if (path === "render") {
      response = jsonResponse(405, { error: "Method not allowed. Use POST for render requests." });
    } else if (path === "health") {
      response = jsonResponse(405, { error: "Method not allowed. Use GET for health checks." });
    } else {
      response = jsonResponse(404, { error: "Not found" });
    }

    // Inject CORS headers into every response
    response.headers = { ...response.headers, ...corsHeaders };
    return response;
  };
}

/** Resolve CORS headers from config. Returns empty object if disabled. */
function resolveCorsHeaders(cors: RenderHandlerConfig["cors"]): Record<string, string> {
  if (cors === false) return {};
  const c: CorsConfig = cors ?? {};
  return {
    "access-control-allow-origin": c.origin ?? "*",
    "access-control-allow-methods": c.methods ?? "GET, POST, OPTIONS",
    "access-control-allow-headers": c.headers ?? "Content-Type",
    "access-control-expose-headers": "X-QR-Version, X-QR-Size, X-QR-ECL, X-QR-Mask, X-QR-Warnings",
  };
}

async function handleRender(
  req: HandlerRequest,
  config: RenderHandlerConfig,
): Promise<HandlerResponse> {
  const started = Date.now();
  const maxImageSize = config.maxImageSize ?? DEFAULT_MAX_IMAGE_SIZE;
  const maxLogoBytes = config.maxLogoBytes ?? DEFAULT_MAX_LOGO_BYTES;
  const maxLogoPixels = config.maxLogoPixels ?? DEFAULT_MAX_LOGO_PIXELS;

  try {
    const options = parseRenderBody(req.body, maxLogoBytes);

    const { style } = resolveStyle(options.style);
    const matrix = encode(options.data, options);
    const pixels = totalPixels(matrix, style.modulePixelSize);
    if (pixels > maxImageSize) {
      throw new ValidationError(
        `Output would be ${pixels}×${pixels} px, above the ${maxImageSize} px limit. ` +
          "Lower modulePixelSize or shorten the data.",
      );
    }

    const logo =
      options.logo === undefined
        ? null
        : await decodeImage(Buffer.from(options.logo, "base64"), { maxPixels: maxLogoPixels });

    const result = compose(matrix, style, logo, {
      onOversizedLogo: options.strict ? "throw" : "warn",
      onWarning: () => {},
    });

    const details = {
      version: matrix.version,
      size: matrix.size,
      errorCorrectionLevel: matrix.errorCorrectionLevel ?? "H",
      mask: matrix.maskId,
      pixels,
    };

    if (config.onRender) {
      const event = {
        details,
        hasLogo: options.logo !== undefined,
        warnings: result.warnings,
        durationMs: Date.now() - started,
        timestamp: new Date(),
      };
      // Fire and forget — callback failures must not break the response
      Promise.resolve()
        .then(() => config.onRender?.(event))
        .catch((err: unknown) => {
          console.warn(
            `[haloqr] onRender callback failed: ${err instanceof Error ? err.message : String(err)}`,
          );
        });
    }

    const headers: Record<string, string> = {
      "content-type": "image/png",
      "cache-control": "no-store",
      "x-qr-version": String(details.version),
      "x-qr-size": String(details.size),
      "x-qr-ecl": details.errorCorrectionLevel,
      "x-qr-mask": String(details.mask),
    };
    if (result.warnings.length > 0) {
      headers["x-qr-warnings"] = result.warnings.map((w) => w.code).join(",");
    }

    return {
      status: 200,
      headers,
      body: new Uint8Array(encodePng(result.bitmap)),
    };
  } catch (err) {
    return errorResponse(err);
  }
}

/**
 * Validate a `POST /render` body.
 *
 * Every problem is collected into one `ValidationError`. The logo is checked
 * against `maxLogoBytes` and returned as bare base64; it is decoded later.
 */
export function parseRenderBody(body: unknown, maxLogoBytes: number = DEFAULT_MAX_LOGO_BYTES): RenderRequestBody {
  if (!isRecord(body)) {
    throw new ValidationError("Request body must be a JSON object");
  }
  const raw = body;
  const issues: string[] = [];

  const data = raw["data"];
  if (typeof data !== "string" || data.length === 0) {
    issues.push("data must be a non-empty string");
  }

  const options: Omit<RenderRequestBody, "data"> = {};

  const ecl = raw["errorCorrectionLevel"];
  if (ecl !== undefined) {
    const level = ERROR_CORRECTION_LEVELS.find((l) => l === ecl);
    if (level) options.errorCorrectionLevel = level;
    else issues.push("errorCorrectionLevel must be one of L, M, Q, H");
  }

  for (const key of ["minVersion", "maxVersion", "mask", "quietZone"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "number" && Number.isInteger(value)) options[key] = value;
    else issues.push(`${key} must be an integer`);
  }

  const boostEcl = raw["boostEcl"];
  if (boostEcl !== undefined) {
    if (typeof boostEcl === "boolean") options.boostEcl = boostEcl;
    else issues.push("boostEcl must be a boolean");
  }

  const strict = raw["strict"];
  if (strict !== undefined) {
    if (typeof strict === "boolean") options.strict = strict;
    else issues.push("strict must be a boolean");
  }

  const style = raw["style"];
  if (style !== undefined) {
    if (isRecord(style)) {
      options.style = parseStyle(style, issues);
    } else {
      issues.push("style must be an object");
    }
  }

  const logo = raw["logo"];
  if (logo !== undefined) {
    if (typeof logo === "string" && logo.length > 0) {
      const base64 = logo.replace(LOGO_DATA_URI_PREFIX, "");
      if (Buffer.byteLength(base64, "base64") > maxLogoBytes) {
        issues.push(`logo must not exceed ${maxLogoBytes} bytes`);
      } else {
        options.logo = base64;
      }
    } else {
      issues.push("logo must be a base64-encoded PNG or JPEG string");
    }
  }

  if (issues.length > 0 || typeof data !== "string") {
    throw new ValidationError(`Invalid render request: ${issues.join("; ")}`, issues);
  }

  return { data, ...options };
}

function parseStyle(raw: Record<string, unknown>, issues: string[]): StyleInput {
  const style: StyleInput = {};

  for (const key of ["moduleColor", "backgroundColor", "borderColor"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "string") style[key] = value;
    else issues.push(`style.${key} must be a hex color string`);
  }

  for (const key of ["modulePixelSize", "logoSizeRatio", "borderWidth"] as const) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value === "number") style[key] = value;
    else issues.push(`style.${key} must be a number`);
  }

  const shape = raw["logoShape"];
  if (shape !== undefined) {
    const match = LOGO_SHAPES.find((s) => s === shape);
    if (match) style.logoShape = match;
    else issues.push(`style.logoShape must be one of ${LOGO_SHAPES.join(", ")}`);
  }

  const background = raw["logoBackgroundStyle"];
  if (background !== undefined) {
    const match = LOGO_BACKGROUND_STYLES.find((s) => s === background);
    if (match) style.logoBackgroundStyle = match;
    else issues.push(`style.logoBackgroundStyle must be one of ${LOGO_BACKGROUND_STYLES.join(", ")}`);
  }

  return style;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function errorResponse(err: unknown): HandlerResponse {
  if (err instanceof DataTooLongError) {
    return jsonResponse(413, { error: err.message, type: err.name });
  }
  if (err instanceof LogoTooLargeError) {
    return jsonResponse(422, {
      error: err.message,
      type: err.name,
      occludedFraction: err.occludedFraction,
      threshold: err.threshold,
    });
  }
  if (err instanceof ValidationError) {
    return jsonResponse(400, { error: err.message, type: err.name, issues: err.issues });
  }
  if (err instanceof HaloQrError) {
    return jsonResponse(400, { error: err.message, type: err.name });
  }
  return jsonResponse(500, { error: "Internal server error" });
}

function jsonResponse(status: number, body: unknown): HandlerResponse {
  return {
    status,
    headers: {
      "content-type": "application/json",
      "cache-control": "no-store",
    },
    body: JSON.stringify(body),
  };
}
