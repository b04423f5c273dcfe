#!/usr/bin/env node
// Copyright 2026 FHIRfly.io LLC. All rights reserved.
// Licensed under the MIT License. See LICENSE file in the project root.
/**
 * CLI entry point for haloqr.
 *
 * Usage: npx haloqr <command> [options]
 */

import { createProgram } from "./program.js";

createProgram().parse();
