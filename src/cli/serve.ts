// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { createServer } from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { createRenderHandler } from "../server/handler.js";
import type { HandlerRequest, HandlerResponse } from "../server/types.js";

export function registerServeCommand(program: Command): void {
  program
    .command("serve")
    .description("Start a local HTTP server that renders QR codes")
    .option("--port <port>", "Port to listen on", process.env["PORT"] ?? "3457")
    .option("--max-image-size <px>", "Largest output image side in pixels", "4096")
    .action((opts: { port: string; maxImageSize: string }) => {
      const port = parseInt(opts.port, 10);
      const baseUrl = `http://localhost:${port}`;

      const handler = createRenderHandler({
        maxImageSize: parseInt(opts.maxImageSize, 10),
        onRender: (event) => {
          console.log(
            `[${event.timestamp.toISOString()}] Render: v${event.details.version} ` +
              `${event.details.pixels}px${event.hasLogo ? " +logo" : ""} (${event.durationMs}ms)`,
          );
        },
      });

      const server = createServer((req, res) => {
        forward(req, res, baseUrl, handler).catch((err: unknown) => {
          res.writeHead(500, { "Content-Type": "application/json" });
          res.end(JSON.stringify({ error: "Internal server error" }));
          console.error("Handler error:", err);
        });
      });

      server.listen(port, () => {
        console.log(`\x1b[32m✓ QR render server running\x1b[0m`);
        console.log(`  URL:  ${baseUrl}`);
        console.log(`  Port: ${port}`);
        console.log(`\nTest with:`);
        console.log(`  curl -X POST ${baseUrl}/render -H 'Content-Type: application/json' \\`);
        console.log(`    -d '{"data":"https://example.com"}' -o qrcode.png`);
        console.log(`\nPress Ctrl+C to stop`);
      });
    });
}

async function forward(
  req: IncomingMessage,
  res: ServerResponse,
  baseUrl: string,
  handler: (req: HandlerRequest) => Promise<HandlerResponse>,
): Promise<void> {
  const url = new URL(req.url ?? "/", baseUrl);

  // Read body for POST requests
  let body: unknown;
  if (req.method === "POST") {
    const chunks: Buffer[] = [];
    for await (const chunk of req) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
    try {
      body = JSON.parse(Buffer.concat(chunks).toString("utf8"));
    } catch {
      // Leave the body undefined; the handler answers 400
      body = undefined;
    }
  }

  // Build headers map
  const headers: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(req.headers)) {
    headers[key.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }

  const response = await handler({
    method: req.method ?? "GET",
    path: url.pathname,
    body,
    headers,
  });

  res.writeHead(response.status, { ...response.headers });
  if (response.body instanceof Uint8Array) {
    res.end(Buffer.from(response.body));
  } else {
    res.end(response.body);
  }
}
