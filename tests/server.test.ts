import { describe, it, expect, vi, afterEach } from "vitest";
import { Jimp } from "jimp";
import { createRenderHandler, parseRenderBody } from "../src/server/handler.js";
import type { HandlerRequest, HandlerResponse } from "../src/server/types.js";
import { Png, Render } from "../src/index.js";

function post(body: unknown, path = "/render"): HandlerRequest {
  return { method: "POST", path, body, headers: { "content-type": "application/json" } };
}

function json(response: HandlerResponse): Record<string, unknown> {
  if (typeof response.body !== "string") throw new Error("expected a JSON body");
  return JSON.parse(response.body);
}

const logoBase64 = Png.encodePng(Render.createLogoAsset(2, 2, new Uint8Array(16).fill(200))).toString("base64");

/** Base64 PNG whose header claims `width × height` while carrying 2×2 pixels. */
function pngClaiming(width: number, height: number): string {
  const png = Buffer.from(Png.encodePng(Render.createLogoAsset(2, 2, new Uint8Array(16))));
  png.writeUInt32BE(width, 16);
  png.writeUInt32BE(height, 20);
  return png.toString("base64");
}

afterEach(() => {
  vi.restoreAllMocks();
});

// ─────────────────────────────────────────────
// Routing
// ─────────────────────────────────────────────

describe("createRenderHandler() — routing", () => {
  it("answers GET /health", async () => {
    const handle = createRenderHandler();
    const res = await handle({ method: "GET", path: "/health", headers: {} });
    expect(res.status).toBe(200);
    expect(json(res)).toEqual({ status: "ok" });
  });

  it("answers CORS preflight with 204", async () => {
    const handle = createRenderHandler();
    const res = await handle({ method: "OPTIONS", path: "/render", headers: {} });
    expect(res.status).toBe(204);
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-allow-methods"]).toBe("GET, POST, OPTIONS");
  });

  it("adds CORS headers to every response", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello" }));
    expect(res.headers["access-control-allow-origin"]).toBe("*");
    expect(res.headers["access-control-expose-headers"]).toContain("X-QR-Version");
  });

  it("uses a custom CORS origin", async () => {
    const handle = createRenderHandler({ cors: { origin: "https://app.example.com" } });
    const res = await handle({ method: "GET", path: "/health", headers: {} });
    expect(res.headers["access-control-allow-origin"]).toBe("https://app.example.com");
  });

  it("omits CORS headers when disabled", async () => {
    const handle = createRenderHandler({ cors: false });
    const res = await handle({ method: "GET", path: "/health", headers: {} });
    expect(res.headers["access-control-allow-origin"]).toBeUndefined();
  });

  it("rejects the wrong method with 405", async () => {
    const handle = createRenderHandler();
    expect((await handle({ method: "GET", path: "/render", headers: {} })).status).toBe(405);
    expect((await handle(post({}, "/health"))).status).toBe(405);
  });

  it("returns 404 for unknown paths", async () => {
    const handle = createRenderHandler();
    const res = await handle({ method: "GET", path: "/nope", headers: {} });
    expect(res.status).toBe(404);
    expect(json(res)).toEqual({ error: "Not found" });
  });

  it("tolerates trailing slashes", async () => {
    const handle = createRenderHandler();
    expect((await handle({ method: "GET", path: "/health/", headers: {} })).status).toBe(200);
  });
});

// ─────────────────────────────────────────────
// POST /render
// ─────────────────────────────────────────────

describe("createRenderHandler() — POST /render", () => {
  it("returns a PNG with symbol details in headers", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", mask: 2 }));

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/png");
    expect(res.headers["x-qr-version"]).toBe("1");
    expect(res.headers["x-qr-size"]).toBe("21");
    expect(res.headers["x-qr-ecl"]).toBe("H");
    expect(res.headers["x-qr-mask"]).toBe("2");
    expect(res.headers["x-qr-warnings"]).toBeUndefined();

    if (typeof res.body === "string") throw new Error("expected a binary body");
    expect(Png.decodePng(res.body).width).toBe(435);
  });

  it("applies style fields", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", style: { modulePixelSize: 2, backgroundColor: "#ff0000" } }));
    if (typeof res.body === "string") throw new Error("expected a binary body");
    const image = Png.decodePng(res.body);
    expect(image.width).toBe(58);
    expect(Array.from(image.data.subarray(0, 4))).toEqual([255, 0, 0, 255]);
  });

  it("accepts a base64 logo, with or without a data URI prefix", async () => {
    const handle = createRenderHandler();
    const plain = await handle(post({ data: "hello", logo: logoBase64 }));
    const prefixed = await handle(post({ data: "hello", logo: `data:image/png;base64,${logoBase64}` }));
    expect(plain.status).toBe(200);
    expect(prefixed.status).toBe(200);
  });

  it("accepts a JPEG logo", async () => {
    const jpeg = await new Jimp({ width: 8, height: 8, color: 0x0000ffff }).getBuffer("image/jpeg");
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", logo: `data:image/jpeg;base64,${jpeg.toString("base64")}` }));
    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/png");
  });

  it("lists advisory warning codes", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", errorCorrectionLevel: "L", boostEcl: false, logo: logoBase64 }));
    expect(res.status).toBe(200);
    expect(res.headers["x-qr-ecl"]).toBe("L");
    expect(res.headers["x-qr-warnings"]).toBe("logo-too-large,low-error-correction");
  });

  it("returns 422 for an oversized logo in strict mode", async () => {
    const handle = createRenderHandler();
    const res = await handle(
      post({ data: "hello", errorCorrectionLevel: "L", boostEcl: false, logo: logoBase64, strict: true }),
    );
    expect(res.status).toBe(422);
    const body = json(res);
    expect(body["type"]).toBe("LogoTooLargeError");
    expect(body["threshold"]).toBe(0.07);
  });

  it("returns 413 when the data does not fit", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "x".repeat(200), maxVersion: 2 }));
    expect(res.status).toBe(413);
    expect(json(res)["type"]).toBe("DataTooLongError");
  });

  it("returns 400 for an invalid color", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", style: { moduleColor: "blue" } }));
    expect(res.status).toBe(400);
    expect(json(res)["type"]).toBe("InvalidColorError");
  });

  it("returns 400 for an undecodable logo", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", logo: Buffer.from("not a png").toString("base64") }));
    expect(res.status).toBe(400);
    expect(json(res)["type"]).toBe("ImageDecodeError");
  });

  it("returns 400 with issues for a malformed body", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "", mask: "two", style: { logoShape: "star" } }));
    expect(res.status).toBe(400);
    const body = json(res);
    expect(body["type"]).toBe("ValidationError");
    expect(body["issues"]).toEqual([
      "data must be a non-empty string",
      "mask must be an integer",
      "style.logoShape must be one of square, circle, rounded-rect",
    ]);
  });

  it("returns 400 when the body is not an object", async () => {
    const handle = createRenderHandler();
    const res = await handle(post(undefined));
    expect(res.status).toBe(400);
    expect(json(res)["error"]).toBe("Request body must be a JSON object");
  });

  it("enforces maxImageSize", async () => {
    const handle = createRenderHandler({ maxImageSize: 100 });
    const res = await handle(post({ data: "hello" }));
    expect(res.status).toBe(400);
    expect(json(res)["error"]).toMatch(/^Output would be 435×435 px, above the 100 px limit/);
  });

  it("rejects a logo whose header exceeds maxLogoPixels", async () => {
    const handle = createRenderHandler();
    const res = await handle(post({ data: "hello", logo: pngClaiming(6000, 6000) }));
    expect(res.status).toBe(400);
    const body = json(res);
    expect(body["type"]).toBe("ValidationError");
    expect(body["issues"]).toEqual(["logo must not exceed 4000000 pixels, got 6000×6000"]);
  });

  it("uses a custom maxLogoPixels", async () => {
    const handle = createRenderHandler({ maxLogoPixels: 3 });
    const res = await handle(post({ data: "hello", logo: logoBase64 }));
    expect(res.status).toBe(400);
    expect(json(res)["issues"]).toEqual(["logo must not exceed 3 pixels, got 2×2"]);
  });

  it("enforces maxLogoBytes", async () => {
    const handle = createRenderHandler({ maxLogoBytes: 10 });
    const res = await handle(post({ data: "hello", logo: logoBase64 }));
    expect(res.status).toBe(400);
    expect(json(res)["issues"]).toEqual(["logo must not exceed 10 bytes"]);
  });
});

// ─────────────────────────────────────────────
// onRender callback
// ─────────────────────────────────────────────

describe("createRenderHandler() — onRender", () => {
  it("reports each render", async () => {
    const onRender = vi.fn();
    const handle = createRenderHandler({ onRender });
    await handle(post({ data: "hello", logo: logoBase64 }));
    await new Promise((r) => setTimeout(r, 0));

    expect(onRender).toHaveBeenCalledTimes(1);
    expect(onRender).toHaveBeenCalledWith(
      expect.objectContaining({
        hasLogo: true,
        warnings: [],
        details: { version: 1, size: 21, errorCorrectionLevel: "H", mask: expect.any(Number), pixels: 435 },
      }),
    );
  });

  it("does not fail the response when the callback rejects", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const handle = createRenderHandler({ onRender: () => Promise.reject(new Error("metrics down")) });
    const res = await handle(post({ data: "hello" }));
    await new Promise((r) => setTimeout(r, 0));

    expect(res.status).toBe(200);
    expect(warn).toHaveBeenCalledWith("[haloqr] onRender callback failed: metrics down");
  });

  it("is not called for failed renders", async () => {
    const onRender = vi.fn();
    const handle = createRenderHandler({ onRender });
    await handle(post({ data: "" }));
    await new Promise((r) => setTimeout(r, 0));
    expect(onRender).not.toHaveBeenCalled();
  });
});

describe("parseRenderBody()", () => {
  it("reads strict as a boolean", () => {
    expect(parseRenderBody({ data: "a", strict: true }).strict).toBe(true);
    expect(parseRenderBody({ data: "a" }).strict).toBeUndefined();
    expect(() => parseRenderBody({ data: "a", strict: "yes" })).toThrow(/strict must be a boolean/);
  });

  it("strips PNG and JPEG data URI prefixes from the logo", () => {
    expect(parseRenderBody({ data: "a", logo: "data:image/png;base64,AAAA" }).logo).toBe("AAAA");
    expect(parseRenderBody({ data: "a", logo: "data:image/jpeg;base64,AAAA" }).logo).toBe("AAAA");
    expect(parseRenderBody({ data: "a", logo: "data:image/jpg;base64,AAAA" }).logo).toBe("AAAA");
    expect(parseRenderBody({ data: "a", logo: "AAAA" }).logo).toBe("AAAA");
  });

  it("copies typed fields through", () => {
    expect(
      parseRenderBody({
        data: "a",
        errorCorrectionLevel: "Q",
        minVersion: 2,
        quietZone: 1,
        boostEcl: false,
        style: { logoBackgroundStyle: "gradient-halo", borderWidth: 2 },
      }),
    ).toEqual({
      data: "a",
      errorCorrectionLevel: "Q",
      minVersion: 2,
      quietZone: 1,
      boostEcl: false,
      style: { logoBackgroundStyle: "gradient-halo", borderWidth: 2 },
    });
  });

  it("rejects wrongly typed fields", () => {
    expect(() => parseRenderBody({ data: "a", errorCorrectionLevel: "X" })).toThrow(/errorCorrectionLevel must be one of/);
    expect(() => parseRenderBody({ data: "a", style: { borderWidth: "2" } })).toThrow(/style.borderWidth must be a number/);
    expect(() => parseRenderBody({ data: "a", logo: 42 })).toThrow(/logo must be a base64-encoded PNG or JPEG string/);
    expect(() => parseRenderBody([])).toThrow(/must be a JSON object/);
  });
});
