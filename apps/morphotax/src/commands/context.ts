/**
 * @fileoverview Shared command plumbing
 *
 * @module commands/context
 */

import chalk from "chalk";
import { consoleLogger, isTaxonomyError, type EngineLogger } from "@morphotax/engine";
import type { AppConfig } from "../config/index.js";
import type { TaxonomyWorkspace } from "../adapters/files/index.js";

/**
 * Everything a command needs besides its own arguments.
 */
export interface CommandContext {
    readonly config: AppConfig;
    readonly workspace: TaxonomyWorkspace;
    readonly logger: EngineLogger;

    /** User-facing output, one line per call */
    readonly print: (line?: string) => void;
}

/**
 * Options every command inherits from the program.
 */
export type GlobalOptions = {
    taxonomy?: string;
    verbose?: boolean;
};

/**
 * Logger for the CLI: everything with --verbose, warnings and errors otherwise.
 */
export function createCliLogger(verbose: boolean): EngineLogger {
    if (verbose) {
        return consoleLogger;
    }
    return {
        debug: () => undefined,
        info : () => undefined,
        warn : consoleLogger.warn,
        error: consoleLogger.error,
    };
}

/**
 * Parse "length=2,width=0.5" into weights.
 *
 * @throws Error naming the bad pair
 */
export function parseWeights(value: string): Record<string, number> {
    const weights: Record<string, number> = {};

    for (const pair of value.split(",")) {
        const trimmed = pair.trim();
        if (trimmed.length === 0) {
            continue;
        }

        const separator = trimmed.indexOf("=");
        const key = separator > 0 ? trimmed.slice(0, separator).trim() : "";
        const weight = Number(trimmed.slice(separator + 1));

        if (key.length === 0 || separator === trimmed.length - 1 || !Number.isFinite(weight)) {
            throw new Error(`Invalid weight "${trimmed}": expected feature=number`);
        }
        weights[key] = weight;
    }

    return weights;
}

/**
 * Parse a numeric option.
 *
 * @throws Error naming the option
 */
export function parseNumberOption(name: string, value: string): number {
    const parsed = Number(value);
    if (value.trim().length === 0 || !Number.isFinite(parsed)) {
        throw new Error(`Option ${name} expects a number, got "${value}"`);
    }
    return parsed;
}

/**
 * One line describing a failure, for the terminal.
 */
export function formatError(error: unknown): string {
    if (isTaxonomyError(error)) {
        return chalk.red(`Error [${error.code}]: ${error.message}`);
    }
    if (error instanceof Error) {
        return chalk.red(`Error: ${error.message}`);
    }
    return chalk.red("An unexpected error occurred");
}
