// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import type { Command } from "commander";
import type { EncodeFlags } from "./generate.js";
import { addEncodeOptions, parseEncodeFlags } from "./generate.js";
import { encode } from "../qr/encode.js";

export function registerInspectCommand(program: Command): void {
  addEncodeOptions(
    program
      .command("inspect <text>")
      .description("Show the QR version, size, error correction level and mask for text"),
  )
    .option("--json", "Output as JSON")
    .action((text: string, opts: EncodeFlags & { json?: boolean }) => {
      try {
        const matrix = encode(text, parseEncodeFlags(opts));
        const dark = matrix.rows.reduce((n, row) => n + row.filter(Boolean).length, 0);

        if (opts.json) {
          console.log(JSON.stringify({
            version: matrix.version,
            size: matrix.size,
            errorCorrectionLevel: matrix.errorCorrectionLevel,
            mask: matrix.maskId,
            quietZone: matrix.quietZone,
            darkModules: dark,
          }, null, 2));
          return;
        }

        console.log(`\x1b[32m✓ Encoded\x1b[0m`);
        console.log(`  Version: ${matrix.version}`);
        console.log(`  Size:    ${matrix.size}×${matrix.size} modules`);
        console.log(`  ECL:     ${matrix.errorCorrectionLevel ?? "unknown"}`);
        console.log(`  Mask:    ${matrix.maskId}`);
        console.log(`  Dark:    ${dark} of ${matrix.size * matrix.size} modules`);
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      }
    });
}
