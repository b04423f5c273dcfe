// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
import { Command } from "commander";
import { existsSync, readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import { registerGenerateCommand } from "./generate.js";
import { registerInspectCommand } from "./inspect.js";
import { registerServeCommand } from "./serve.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  // dist/cli.js sits one level below package.json, src/cli/program.ts two
  for (const pkgPath of [resolve(__dirname, "..", "package.json"), resolve(__dirname, "..", "..", "package.json")]) {
    if (!existsSync(pkgPath)) continue;
    try {
      const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf8"));
      if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
        return pkg.version;
      }
    } catch {
      return "0.0.0";
    }
  }
  return "0.0.0";
}

/**
 * Build the `haloqr` command tree.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("haloqr")
    .description("Styled QR codes with embedded logos — encode, composite and export PNG")
    .version(getVersion());

  registerGenerateCommand(program);
  registerInspectCommand(program);
  registerServeCommand(program);

  return program;
}
