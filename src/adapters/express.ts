// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { createRenderHandler } from "../server/handler.js";
import type { RenderHandlerConfig, HandlerRequest } from "../server/types.js";

// Minimal Express types — avoids requiring @types/express at runtime
interface ExpressRequest {
  method: string;
  path: string;
  body?: unknown;
  query?: Record<string, unknown>;
  headers: Record<string, string | string[] | undefined>;
}

interface ExpressResponse {
  status(code: number): ExpressResponse;
  set(headers: Record<string, string>): ExpressResponse;
  send(body: string | Buffer): void;
}

/**
 * Create an Express-compatible middleware that renders QR codes.
 *
 * Mount it on any path prefix; it serves `POST /render` and `GET /health`
 * below that prefix. Register `express.json()` first, with a body limit large
 * enough for base64 logos.
 *
 * PNG responses carry `Content-Length`. Adding `?download` to the request
 * URL also sets `Content-Disposition: attachment` with a file name built
 * from the QR version, e.g. `qrcode-v3.png`.
 *
 * @example
 * ```ts
 * import express from "express";
 * import { expressMiddleware } from "haloqr/express";
 *
 * const app = express();
 * app.use(express.json({ limit: "4mb" }));
 * app.use("/qr", expressMiddleware({ maxImageSize: 2048 }));
 * ```
 */
export function expressMiddleware(
  config: RenderHandlerConfig = {},
): (req: ExpressRequest, res: ExpressResponse) => void {
  const handle = createRenderHandler(config);

  return (req: ExpressRequest, res: ExpressResponse): void => {
    const handlerReq: HandlerRequest = {
      method: req.method,
      path: req.path,
      body: req.body,
      headers: normalizeHeaders(req.headers),
    };

    handle(handlerReq)
      .then((result) => {
        if (typeof result.body === "string") {
          res.status(result.status).set(result.headers).send(result.body);
          return;
        }
        const png = Buffer.from(result.body);
        const headers: Record<string, string> = { ...result.headers, "content-length": String(png.length) };
        if (req.query?.["download"] !== undefined) {
          headers["content-disposition"] =
            `attachment; filename="qrcode-v${result.headers["x-qr-version"] ?? "0"}.png"`;
        }
        res.status(result.status).set(headers).send(png);
      })
      .catch((err: unknown) => {
        console.error("[haloqr] Handler error:", err);
        res.status(500).set({ "content-type": "application/json" }).send(
          JSON.stringify({ error: "Internal server error" }),
        );
      });
  };
}

function normalizeHeaders(
  headers: Record<string, string | string[] | undefined>,
): Record<string, string | undefined> {
  const result: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }
  return result;
}
