/**
 * @fileoverview Structured file reader
 *
 * Reads JSON or YAML by extension. Every input file the CLI accepts
 * (features, clusters, change sets, presets) goes through here.
 *
 * @module config/readStructuredFile
 */

import { readFileSync, existsSync } from "fs";
import { extname } from "path";
import { parse as parseYaml } from "yaml";

export type StructuredFormat = "json" | "yaml";

/**
 * Pick the parser for a path.
 *
 * @throws Error for an extension other than .json, .yml or .yaml
 */
export function formatOf(filePath: string): StructuredFormat {
    const extension = extname(filePath).toLowerCase();

    if (extension === ".json") {
        return "json";
    }
    if (extension === ".yml" || extension === ".yaml") {
        return "yaml";
    }

    throw new Error(`Unsupported file type for ${filePath}: expected .json, .yml or .yaml`);
}

/**
 * Read and parse a JSON or YAML file.
 *
 * @returns The parsed value, not yet validated
 * @throws Error naming the path if the file is missing or cannot be parsed
 */
export function readStructuredFile(filePath: string): unknown {
    const format = formatOf(filePath);

    if (!existsSync(filePath)) {
        throw new Error(`File not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");

    try {
        return format === "json" ? JSON.parse(content) as unknown : parseYaml(content) as unknown;
    }
    catch (error) {
        throw new Error(`Invalid ${format.toUpperCase()} in ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
}
