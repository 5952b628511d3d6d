#!/usr/bin/env node

/**
 * @fileoverview Morphotax - Main Entry Point
 *
 * @module morphotax
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { formatError } from "./commands/index.js";
import { createProgram } from "./program.js";

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        console.error(formatError(error));
        process.exitCode = 1;
    });
