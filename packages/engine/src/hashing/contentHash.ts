/**
 * @fileoverview Content hashing for class definitions
 *
 * The content hash identifies what a class actually tests: its parameters
 * (name, target, bounds, tolerance, weight) per namespace and its boolean
 * gates. Identity fields (class id, name, creator, timestamps, samples) and
 * the unit label are not part of it.
 *
 * The canonical encoding sorts every key and formats every number the same
 * way, so the digest never depends on Map insertion order.
 *
 * @module @morphotax/engine/hashing/contentHash
 */

import { createHash } from "crypto";
import type { Parameter } from "../contracts/Parameter.js";

/**
 * The hashed subset of a class definition.
 */
export interface HashableContent {
    readonly morphometricParams: ReadonlyMap<string, Parameter>;
    readonly technologicalParams: ReadonlyMap<string, Parameter>;
    readonly optionalFeatures: ReadonlyMap<string, boolean>;
}

/**
 * Fixed number formatting: shortest round-trip representation, with -0 folded into 0.
 */
export function formatCanonicalNumber(value: number): string {
    if (!Number.isFinite(value)) {
        throw new RangeError(`Cannot canonicalize non-finite number: ${value}`);
    }
    return Object.is(value, -0) ? "0" : String(value);
}

function compareKeys(a: string, b: string): number {
    if (a < b) {
        return -1;
    }
    return a > b ? 1 : 0;
}

function encodeString(value: string): string {
    return JSON.stringify(value);
}

function encodeParameters(params: ReadonlyMap<string, Parameter>): string {
    const sorted = Array.from(params.entries()).sort(([a], [b]) => compareKeys(a, b));

    const entries = sorted.map(([name, param]) => {
        const fields = [
            `"max":${formatCanonicalNumber(param.maxThreshold)}`,
            `"min":${formatCanonicalNumber(param.minThreshold)}`,
            `"name":${encodeString(param.name)}`,
            `"target":${formatCanonicalNumber(param.targetValue)}`,
            `"tolerance":${formatCanonicalNumber(param.tolerance)}`,
            `"weight":${formatCanonicalNumber(param.weight)}`,
        ];
        return `${encodeString(name)}:{${fields.join(",")}}`;
    });

    return `{${entries.join(",")}}`;
}

function encodeGates(gates: ReadonlyMap<string, boolean>): string {
    const sorted = Array.from(gates.entries()).sort(([a], [b]) => compareKeys(a, b));
    const entries = sorted.map(([name, required]) => `${encodeString(name)}:${required ? "true" : "false"}`);
    return `{${entries.join(",")}}`;
}

/**
 * Produce the canonical text that is hashed.
 *
 * @example
 * ```typescript
 * canonicalEncoding(content);
 * // {"gates":{"has_socket":true},"morphometric":{"length":{"max":122,...}},"technological":{}}
 * ```
 */
export function canonicalEncoding(content: HashableContent): string {
    return [
        `{"gates":${encodeGates(content.optionalFeatures)}`,
        `"morphometric":${encodeParameters(content.morphometricParams)}`,
        `"technological":${encodeParameters(content.technologicalParams)}}`,
    ].join(",");
}

/**
 * Compute the SHA-256 content hash (lowercase hex).
 */
export function computeContentHash(content: HashableContent): string {
    return createHash("sha256").update(canonicalEncoding(content), "utf8").digest("hex");
}
