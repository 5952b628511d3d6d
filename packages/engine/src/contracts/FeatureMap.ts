/**
 * FeatureMap Contract
 *
 * The flat set of named measurements an external feature extractor
 * produces for one artifact. Every value is tagged with its kind so that
 * numeric parameters and boolean gates never confuse one another.
 *
 * A key that is not present in the map is MISSING. Nothing in the engine
 * substitutes a default for a missing key.
 */

/**
 * A single measured value.
 */
export type FeatureValue =
    | { readonly kind: "number"; readonly value: number }
    | { readonly kind: "boolean"; readonly value: boolean };

/**
 * Named measurements for one artifact.
 */
export type FeatureMap = ReadonlyMap<string, FeatureValue>;

/**
 * An artifact used as class evidence (reference group, cluster member).
 */
export interface ReferenceArtifact {
    /** Artifact identifier; builders fall back to `ref_<index>` when absent */
    readonly id?: string;

    /** Measured features */
    readonly features: FeatureMap;
}

/**
 * Result of converting an untyped record into a FeatureMap.
 */
export interface FeatureConversion {
    readonly features: FeatureMap;

    /** Keys that were dropped because their value is neither a finite number nor a boolean */
    readonly skipped: readonly string[];
}

export function numberFeature(value: number): FeatureValue {
    return Object.freeze({ kind: "number", value });
}

export function booleanFeature(value: boolean): FeatureValue {
    return Object.freeze({ kind: "boolean", value });
}

/**
 * Read a numeric feature.
 *
 * @returns The value, or undefined if the key is missing or holds a boolean
 */
export function getNumber(features: FeatureMap, key: string): number | undefined {
    const feature = features.get(key);
    return feature?.kind === "number" ? feature.value : undefined;
}

/**
 * Read a boolean feature.
 *
 * @returns The value, or undefined if the key is missing or holds a number
 */
export function getBoolean(features: FeatureMap, key: string): boolean | undefined {
    const feature = features.get(key);
    return feature?.kind === "boolean" ? feature.value : undefined;
}

/**
 * Convert a plain object (parsed JSON or YAML) into a FeatureMap.
 *
 * Finite numbers and booleans are kept. Everything else (strings, null,
 * nested objects, NaN, Infinity) is skipped and reported, never coerced.
 *
 * @param record - Plain feature object
 * @param ignore - Keys that carry identity rather than measurements (e.g. "id")
 *
 * @example
 * ```typescript
 * const { features, skipped } = featureMapFromRecord(
 *     { id: "AXE_1", length: 120, has_socket: true, shape: "lunate" },
 *     ["id"],
 * );
 * // features: length -> 120, has_socket -> true
 * // skipped: ["shape"]
 * ```
 */
export function featureMapFromRecord(
    record: Readonly<Record<string, unknown>>,
    ignore: readonly string[] = []
): FeatureConversion {
    const features = new Map<string, FeatureValue>();
    const skipped: string[] = [];

    for (const [key, value] of Object.entries(record)) {
        if (ignore.includes(key)) {
            continue;
        }

        if (typeof value === "number" && Number.isFinite(value)) {
            features.set(key, numberFeature(value));
        }
        else if (typeof value === "boolean") {
            features.set(key, booleanFeature(value));
        }
        else {
            skipped.push(key);
        }
    }

    return { features, skipped };
}

/**
 * Build a FeatureMap from a record whose values are already numbers or booleans.
 */
export function createFeatureMap(record: Readonly<Record<string, number | boolean>>): FeatureMap {
    return featureMapFromRecord(record).features;
}

/**
 * Convert a FeatureMap back to a plain object (for files, prompts and logs).
 */
export function featureMapToRecord(features: FeatureMap): Record<string, number | boolean> {
    const record: Record<string, number | boolean> = {};
    for (const [key, feature] of features) {
        record[key] = feature.value;
    }
    return record;
}
