/**
 * haloqr — End-to-end demo
 *
 * Renders the same URL with each logo shape and background style, using a
 * generated two-tone badge as the logo.
 *
 * Usage:
 *   npx tsx examples/demo.ts                    # writes PNGs to ./qr-output
 *   npx tsx examples/demo.ts --url <url>        # encode a different URL
 */

import { writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { Png, Render, generatePng } from "../src/index.js";

// ---------------------------------------------------------------------------
// CLI argument parsing (no deps)
// ---------------------------------------------------------------------------

function getArg(name: string): string | undefined {
  const idx = process.argv.indexOf(`--${name}`);
  if (idx === -1 || idx + 1 >= process.argv.length) return undefined;
  return process.argv[idx + 1];
}

const url = getArg("url") ?? "https://example.com/halo";
const outputDir = "./qr-output";

/** 64×64 badge: orange disc on a transparent background. */
function makeBadge(): Render.LogoAsset {
  const size = 64;
  const data = new Uint8Array(size * size * 4);
  for (let y = 0; y < size; y++) {
    for (let x = 0; x < size; x++) {
      const i = (y * size + x) * 4;
      const inside = Math.hypot(x + 0.5 - size / 2, y + 0.5 - size / 2) <= size / 2 - 2;
      data[i] = 245;
      data[i + 1] = 130;
      data[i + 2] = 32;
      data[i + 3] = inside ? 255 : 0;
    }
  }
  return Render.createLogoAsset(size, size, data);
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

function main(): void {
  console.log("=== haloqr Demo ===\n");
  mkdirSync(outputDir, { recursive: true });

  const logo = makeBadge();
  writeFileSync(join(outputDir, "badge.png"), Png.encodePng(logo));

  for (const logoShape of Render.LOGO_SHAPES) {
    for (const logoBackgroundStyle of Render.LOGO_BACKGROUND_STYLES) {
      const result = generatePng({
        data: url,
        errorCorrectionLevel: "H",
        logo,
        style: {
          moduleColor: "#1b2a4a",
          backgroundColor: "#fdfcf7",
          modulePixelSize: 12,
          logoShape,
          logoBackgroundStyle,
          logoSizeRatio: 0.25,
          borderWidth: 3,
          borderColor: "#f58220",
        },
      });

      const file = join(outputDir, `${logoShape}-${logoBackgroundStyle}.png`);
      writeFileSync(file, result.png);
      console.log(
        `${file}  v${result.details.version} ${result.details.errorCorrectionLevel} ` +
          `mask ${result.details.mask}  ${result.details.pixels}px`,
      );
    }
  }

  console.log(`\nDone. Files written to ${outputDir}`);
}

main();
