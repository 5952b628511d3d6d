/**
 * @fileoverview Cluster assignment loader
 *
 * Cluster labels come from an external clustering step. The file maps
 * artifact ids to labels, either directly or under `assignments`.
 *
 * @module config/loadClusters
 */

import { z } from "zod";
import { readStructuredFile } from "./readStructuredFile.js";

const LabelSchema = z.union([z.string(), z.number().int()]);

const AssignmentsSchema = z.record(LabelSchema);

const WrappedAssignmentsSchema = z.object({ assignments: AssignmentsSchema });

/**
 * Convert parsed file content into an assignment map.
 */
export function clustersFromContent(content: unknown, source: string): Map<string, string | number> {
    const wrapped = WrappedAssignmentsSchema.safeParse(content);
    if (wrapped.success) {
        return new Map(Object.entries(wrapped.data.assignments));
    }

    const direct = AssignmentsSchema.safeParse(content);
    if (direct.success) {
        return new Map(Object.entries(direct.data));
    }

    throw new Error(`Invalid cluster file ${source}: expected { <artifactId>: <label> } or { assignments: {...} }`);
}

/**
 * Load cluster assignments (artifact id -> label) from JSON or YAML.
 *
 * @example
 * ```yaml
 * assignments:
 *   AXE_1: 0
 *   AXE_2: 0
 *   AXE_3: -1
 * ```
 */
export function loadClusters(filePath: string): Map<string, string | number> {
    return clustersFromContent(readStructuredFile(filePath), filePath);
}
