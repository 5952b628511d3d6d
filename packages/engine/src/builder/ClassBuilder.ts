/**
 * @fileoverview ClassBuilder
 *
 * Derives a class definition from a reference group of measured artifacts.
 * The derived class is exactly as permissive as its evidence: the observed
 * extremes become the hard bounds and the mean becomes the target.
 *
 * @module @morphotax/engine/builder/ClassBuilder
 */

import type { ClassDefinition } from "../contracts/ClassDefinition.js";
import { createClassDefinition } from "../contracts/ClassDefinition.js";
import type { ReferenceArtifact } from "../contracts/FeatureMap.js";
import type { ParameterInput } from "../contracts/Parameter.js";
import { DEFAULT_PARAMETER_UNIT } from "../contracts/Parameter.js";
import { InsufficientSamplesError, InvalidParameterError } from "../errors/TaxonomyError.js";

/**
 * Features that describe manufacture rather than shape. Numeric keys in
 * this set go to the technological namespace unless the caller overrides it.
 */
export const DEFAULT_TECHNOLOGICAL_KEYS: readonly string[] = Object.freeze([
    "socket_depth",
    "socket_diameter",
    "edge_angle",
    "hammering_index",
]);

export const DEFAULT_TOLERANCE_FACTOR = 0.15;

export const MIN_REFERENCE_OBJECTS = 2;

/**
 * Options for deriving a class.
 */
export interface BuildOptions {
    /** Per-feature weights; unlisted features weigh 1.0 */
    readonly weights?: Readonly<Record<string, number>>;

    /** Tolerance as a fraction of the target value (default: 0.15) */
    readonly toleranceFactor?: number;

    /** Membership threshold (default: 0.75) */
    readonly confidenceThreshold?: number;

    /** Explicit class id (default: TYPE_<NAME>) */
    readonly classId?: string;

    readonly description?: string;

    /** Creator recorded on the class (default: "system") */
    readonly createdBy?: string;

    /** Numeric keys that belong to the technological namespace */
    readonly technologicalKeys?: Iterable<string>;

    /** Unit label per feature (default: "mm") */
    readonly units?: Readonly<Record<string, string>>;

    /** Clock, for reproducible timestamps */
    readonly now?: () => Date;
}

/**
 * Why a feature did not become a parameter or gate.
 */
export type DroppedKeyReason =
    | "not-in-every-object"
    | "mixed-kinds"
    | "boolean-varies"
    | "no-spread";

export interface DroppedKey {
    readonly key: string;
    readonly reason: DroppedKeyReason;
}

/**
 * A derived class plus the features that were left out of it.
 */
export interface BuildOutcome {
    readonly definition: ClassDefinition;
    readonly droppedKeys: readonly DroppedKey[];
}

/**
 * Default class id for a class name: TYPE_ plus the upper-cased name with
 * every run of other characters collapsed to "_".
 *
 * @example
 * ```typescript
 * defaultClassId("Savignano type"); // "TYPE_SAVIGNANO_TYPE"
 * ```
 */
export function defaultClassId(name: string): string {
    const slug = name
        .toUpperCase()
        .replace(/[^A-Z0-9]+/g, "_")
        .replace(/^_+|_+$/g, "");
    return `TYPE_${slug || "CLASS"}`;
}

/**
 * Collect feature keys in first-seen order across the group.
 */
function collectKeys(references: readonly ReferenceArtifact[]): string[] {
    const seen = new Set<string>();
    for (const reference of references) {
        for (const key of reference.features.keys()) {
            seen.add(key);
        }
    }
    return Array.from(seen);
}

/**
 * Derive a class from a reference group and report the dropped features.
 *
 * - needs at least two reference objects
 * - a numeric feature present in every object becomes a parameter:
 *   target = mean, bounds = observed min/max,
 *   tolerance = factor * |target| (factor * range when the target is 0)
 * - a boolean feature with one value across the whole group becomes a gate
 * - anything partially missing, mixed or varying is dropped, never imputed
 *
 * @throws InsufficientSamplesError with fewer than two reference objects
 * @throws InvalidParameterError on a non-positive tolerance factor or bad weight
 */
export function buildClassFromReferenceGroup(
    name: string,
    references: readonly ReferenceArtifact[],
    options: BuildOptions = {}
): BuildOutcome {
    if (references.length < MIN_REFERENCE_OBJECTS) {
        throw new InsufficientSamplesError(name, references.length, MIN_REFERENCE_OBJECTS);
    }

    const toleranceFactor = options.toleranceFactor ?? DEFAULT_TOLERANCE_FACTOR;
    if (!Number.isFinite(toleranceFactor) || toleranceFactor <= 0) {
        throw new InvalidParameterError("toleranceFactor", `must be a positive number, got ${toleranceFactor}`);
    }

    const technologicalKeys = new Set(options.technologicalKeys ?? DEFAULT_TECHNOLOGICAL_KEYS);
    const classId = options.classId ?? defaultClassId(name);

    const morphometricParams: ParameterInput[] = [];
    const technologicalParams: ParameterInput[] = [];
    const gates = new Map<string, boolean>();
    const droppedKeys: DroppedKey[] = [];

    for (const key of collectKeys(references)) {
        const values = references.map((reference) => reference.features.get(key));

        if (values.some((value) => value === undefined)) {
            droppedKeys.push({ key, reason: "not-in-every-object" });
            continue;
        }

        const numbers: number[] = [];
        const booleans: boolean[] = [];
        for (const value of values) {
            if (value?.kind === "number") {
                numbers.push(value.value);
            }
            else if (value?.kind === "boolean") {
                booleans.push(value.value);
            }
        }

        if (booleans.length === values.length) {
            const first = booleans[0];
            if (booleans.every((value) => value === first)) {
                gates.set(key, first);
            }
            else {
                droppedKeys.push({ key, reason: "boolean-varies" });
            }
            continue;
        }

        if (numbers.length !== values.length) {
            droppedKeys.push({ key, reason: "mixed-kinds" });
            continue;
        }

        const mean = numbers.reduce((sum, value) => sum + value, 0) / numbers.length;
        const min = numbers.reduce((low, value) => Math.min(low, value), Infinity);
        const max = numbers.reduce((high, value) => Math.max(high, value), -Infinity);
        // Rounding in the mean may push it a hair outside the observed bounds.
        const targetValue = Math.min(max, Math.max(min, mean));
        const tolerance = targetValue === 0
            ? toleranceFactor * (max - min)
            : toleranceFactor * Math.abs(targetValue);

        if (tolerance <= 0) {
            droppedKeys.push({ key, reason: "no-spread" });
            continue;
        }

        const parameter: ParameterInput = {
            name        : key,
            targetValue,
            minThreshold: min,
            maxThreshold: max,
            tolerance,
            weight      : options.weights?.[key] ?? 1.0,
            unit        : options.units?.[key] ?? DEFAULT_PARAMETER_UNIT,
        };

        if (technologicalKeys.has(key)) {
            technologicalParams.push(parameter);
        }
        else {
            morphometricParams.push(parameter);
        }
    }

    const definition = createClassDefinition({
        classId,
        name,
        description        : options.description ?? `Class defined from ${references.length} reference objects`,
        morphometricParams,
        technologicalParams,
        optionalFeatures   : gates,
        confidenceThreshold: options.confidenceThreshold,
        createdAt          : options.now?.(),
        createdBy          : options.createdBy ?? "system",
        validatedSamples   : references.map((reference, index) => reference.id ?? `ref_${index}`),
    });

    return { definition, droppedKeys };
}

/**
 * Derive a class from a reference group.
 *
 * @example
 * ```typescript
 * const axes = defineFromReferenceGroup("Flanged axe", [
 *     { id: "AXE_1", features: createFeatureMap({ length: 120, width: 65 }) },
 *     { id: "AXE_2", features: createFeatureMap({ length: 122, width: 64 }) },
 * ]);
 * axes.morphometricParams.get("length")?.targetValue; // 121
 * ```
 */
export function defineFromReferenceGroup(
    name: string,
    references: readonly ReferenceArtifact[],
    options: BuildOptions = {}
): ClassDefinition {
    return buildClassFromReferenceGroup(name, references, options).definition;
}
