// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import { readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import type { GenerateOptions } from "../generate.js";
import { generatePng } from "../generate.js";
import { decodeImage } from "../image/decode.js";
import { ERROR_CORRECTION_LEVELS } from "../qr/types.js";
import { LOGO_SHAPES, LOGO_BACKGROUND_STYLES } from "../render/types.js";

/** Options shared by `generate` and `inspect`. */
export interface EncodeFlags {
  ecl: string;
  minVersion: string;
  maxVersion: string;
  mask: string;
  boostEcl: boolean;
  quietZone: string;
}

interface GenerateFlags extends EncodeFlags {
  logo?: string;
  logoSize: string;
  logoShape: string;
  logoBackground: string;
  borderWidth: string;
  borderColor?: string;
  color: string;
  background: string;
  moduleSize: string;
  output: string;
  strict?: boolean;
  json?: boolean;
}

export function addEncodeOptions(command: Command): Command {
  return command
    .option("--ecl <level>", "Error correction level: L, M, Q or H", "H")
    .option("--min-version <n>", "Smallest QR version (1-40)", "1")
    .option("--max-version <n>", "Largest QR version (1-40)", "40")
    .option("--mask <n>", "Mask pattern 0-7, or auto", "auto")
    .option("--no-boost-ecl", "Keep the requested error correction level")
    .option("--quiet-zone <n>", "Quiet zone width in modules", "4");
}

export function registerGenerateCommand(program: Command): void {
  addEncodeOptions(
    program
      .command("generate <text>")
      .description("Render text or a URL as a styled QR code PNG"),
  )
    .option("--logo <file>", "PNG or JPEG logo to place at the center")
    .option("--logo-size <percent>", "Logo width as a percentage of the symbol (max 35)", "25")
    .option("--logo-shape <shape>", `Logo shape: ${LOGO_SHAPES.join(", ")}`, "square")
    .option(
      "--logo-background <style>",
      `Logo background: ${LOGO_BACKGROUND_STYLES.join(", ")}`,
      "solid",
    )
    .option("--border-width <px>", "Border around the logo in pixels", "0")
    .option("--border-color <hex>", "Border color (defaults to --color)")
    .option("--color <hex>", "Module color", "#000000")
    .option("--background <hex>", "Background color", "#FFFFFF")
    .option("--module-size <px>", "Pixels per module", "15")
    .option("--output <file>", "Where to write the PNG", "qrcode.png")
    .option("--strict", "Fail instead of warning when the logo is too large")
    .option("--json", "Output result as JSON")
    .action(async (text: string, opts: GenerateFlags) => {
      try {
        const options: GenerateOptions = {
          data: text,
          ...parseEncodeFlags(opts),
          style: {
            moduleColor: opts.color,
            backgroundColor: opts.background,
            modulePixelSize: parseInteger(opts.moduleSize, "--module-size"),
            logoShape: parseChoice(opts.logoShape, LOGO_SHAPES, "--logo-shape"),
            logoBackgroundStyle: parseChoice(opts.logoBackground, LOGO_BACKGROUND_STYLES, "--logo-background"),
            logoSizeRatio: parseNumber(opts.logoSize, "--logo-size") / 100,
            borderWidth: parseInteger(opts.borderWidth, "--border-width"),
            ...(opts.borderColor !== undefined ? { borderColor: opts.borderColor } : {}),
          },
          onOversizedLogo: opts.strict ? "throw" : "warn",
          onWarning: (w) => {
            if (!opts.json) console.warn(`\x1b[33m⚠ ${w.message}\x1b[0m`);
          },
        };

        if (opts.logo) {
          options.logo = await decodeImage(readFileSync(resolve(opts.logo)));
        }

        const result = generatePng(options);

        const outPath = resolve(opts.output);
        mkdirSync(dirname(outPath), { recursive: true });
        writeFileSync(outPath, result.png);

        if (opts.json) {
          console.log(JSON.stringify({
            output: outPath,
            ...result.details,
            adjustments: result.adjustments,
            warnings: result.warnings,
          }, null, 2));
        } else {
          console.log(`\x1b[32m✓ QR code created\x1b[0m`);
          console.log(`  File:    ${outPath}`);
          console.log(`  Version: ${result.details.version} (${result.details.size}×${result.details.size} modules)`);
          console.log(`  ECL:     ${result.details.errorCorrectionLevel}`);
          console.log(`  Mask:    ${result.details.mask}`);
          console.log(`  Image:   ${result.details.pixels}×${result.details.pixels} px`);
          for (const a of result.adjustments) {
            console.log(`  Note: ${a.field} clamped from ${a.requested} to ${a.applied} (${a.reason})`);
          }
        }
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });
}

export function parseEncodeFlags(opts: EncodeFlags): Pick<
  GenerateOptions,
  "errorCorrectionLevel" | "minVersion" | "maxVersion" | "mask" | "boostEcl" | "quietZone"
> {
  return {
    errorCorrectionLevel: parseChoice(opts.ecl.toUpperCase(), ERROR_CORRECTION_LEVELS, "--ecl"),
    minVersion: parseInteger(opts.minVersion, "--min-version"),
    maxVersion: parseInteger(opts.maxVersion, "--max-version"),
    ...(opts.mask === "auto" ? {} : { mask: parseInteger(opts.mask, "--mask") }),
    boostEcl: opts.boostEcl,
    quietZone: parseInteger(opts.quietZone, "--quiet-zone"),
  };
}

function parseInteger(value: string, flag: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Invalid ${flag}: "${value}" is not an integer`);
  }
  return parseInt(value, 10);
}

function parseNumber(value: string, flag: string): number {
  const n = Number(value);
  if (value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`Invalid ${flag}: "${value}" is not a number`);
  }
  return n;
}

function parseChoice<T extends string>(value: string, choices: readonly T[], flag: string): T {
  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw new Error(`Invalid ${flag}: "${value}". Use one of ${choices.join(", ")}`);
  }
  return match;
}
