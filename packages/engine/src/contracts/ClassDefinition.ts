/**
 * ClassDefinition Contract
 *
 * An immutable, content-hashed bundle of parameters and boolean gates.
 * Class definitions are never edited in place: a modification produces a
 * new definition with its own id and hash.
 */

import { computeContentHash } from "../hashing/contentHash.js";
import { InvalidParameterError } from "../errors/TaxonomyError.js";
import { createParameter, type Parameter, type ParameterInput } from "./Parameter.js";

/**
 * The two parameter namespaces. Both are scored the same way; the split
 * only matters for reporting.
 */
export type ParameterNamespace = "morphometric" | "technological";

/**
 * Immutable taxonomic class.
 */
export interface ClassDefinition {
    /** Stable identifier. Versions append `_v2`, `_v3`, ... to the base id. */
    readonly classId: string;

    readonly name: string;

    readonly description: string;

    /** Continuous shape/size parameters */
    readonly morphometricParams: ReadonlyMap<string, Parameter>;

    /** Continuous manufacture parameters */
    readonly technologicalParams: ReadonlyMap<string, Parameter>;

    /** Boolean gates: required value per feature. Absent keys impose nothing. */
    readonly optionalFeatures: ReadonlyMap<string, boolean>;

    /** Minimum aggregate confidence for membership, in (0, 1] */
    readonly confidenceThreshold: number;

    readonly createdAt: Date;

    readonly createdBy: string;

    /** Artifact ids used to derive or confirm the class, in order */
    readonly validatedSamples: readonly string[];

    /** Digest of parameters and gates (see hashing/contentHash) */
    readonly contentHash: string;
}

/**
 * Gates given either as a Map or as a plain object.
 */
export type GateInput = ReadonlyMap<string, boolean> | Readonly<Record<string, boolean>>;

/**
 * Fields accepted when creating a class definition.
 */
export interface ClassDefinitionInput {
    readonly classId: string;
    readonly name: string;
    readonly description?: string;
    readonly morphometricParams?: readonly ParameterInput[];
    readonly technologicalParams?: readonly ParameterInput[];
    readonly optionalFeatures?: GateInput;
    readonly confidenceThreshold?: number;
    readonly createdAt?: Date;
    readonly createdBy?: string;
    readonly validatedSamples?: readonly string[];
}

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.75;

function buildParameterMap(
    inputs: readonly ParameterInput[],
    classId: string,
    taken: Set<string>
): ReadonlyMap<string, Parameter> {
    const params = new Map<string, Parameter>();

    for (const input of inputs) {
        const parameter = createParameter(input, classId);
        if (taken.has(parameter.name)) {
            throw new InvalidParameterError(parameter.name, "declared more than once", classId);
        }
        taken.add(parameter.name);
        params.set(parameter.name, parameter);
    }

    return params;
}

function isGateMap(gates: GateInput): gates is ReadonlyMap<string, boolean> {
    return gates instanceof Map;
}

function toGateMap(gates: GateInput | undefined, classId: string): ReadonlyMap<string, boolean> {
    let entries: Array<[string, boolean]> = [];
    if (gates !== undefined) {
        entries = isGateMap(gates) ? Array.from(gates.entries()) : Object.entries(gates);
    }

    const map = new Map<string, boolean>();
    for (const [feature, required] of entries) {
        if (typeof required !== "boolean") {
            throw new InvalidParameterError(feature, "gate value must be a boolean", classId);
        }
        map.set(feature, required);
    }
    return map;
}

/**
 * Create a validated, frozen ClassDefinition with its content hash.
 *
 * @throws InvalidParameterError on an empty id, a threshold outside (0, 1],
 *         an invalid parameter, or a name used twice across namespaces
 *
 * @example
 * ```typescript
 * const socketed = createClassDefinition({
 *     classId: "TYPE_SOCKETED",
 *     name: "Socketed axe",
 *     morphometricParams: [
 *         { name: "length", targetValue: 165, minThreshold: 140, maxThreshold: 200, tolerance: 20 },
 *     ],
 *     optionalFeatures: { has_socket: true },
 * });
 * ```
 */
export function createClassDefinition(input: ClassDefinitionInput): ClassDefinition {
    const classId = input.classId;

    if (typeof classId !== "string" || classId.trim().length === 0) {
        throw new InvalidParameterError("classId", "class id must be a non-empty string");
    }

    const confidenceThreshold = input.confidenceThreshold ?? DEFAULT_CONFIDENCE_THRESHOLD;
    if (!Number.isFinite(confidenceThreshold) || confidenceThreshold <= 0 || confidenceThreshold > 1) {
        throw new InvalidParameterError(
            "confidenceThreshold",
            `must be in (0, 1], got ${confidenceThreshold}`,
            classId
        );
    }

    const createdAt = input.createdAt ? new Date(input.createdAt.getTime()) : new Date();
    if (Number.isNaN(createdAt.getTime())) {
        throw new InvalidParameterError("createdAt", "invalid date", classId);
    }

    const taken = new Set<string>();
    const morphometricParams = buildParameterMap(input.morphometricParams ?? [], classId, taken);
    const technologicalParams = buildParameterMap(input.technologicalParams ?? [], classId, taken);
    const optionalFeatures = toGateMap(input.optionalFeatures, classId);

    const definition: ClassDefinition = {
        classId,
        name               : input.name,
        description        : input.description ?? "",
        morphometricParams,
        technologicalParams,
        optionalFeatures,
        confidenceThreshold,
        createdAt,
        createdBy          : input.createdBy ?? "",
        validatedSamples   : Object.freeze([...(input.validatedSamples ?? [])]),
        contentHash        : computeContentHash({ morphometricParams, technologicalParams, optionalFeatures }),
    };

    return Object.freeze(definition);
}

/**
 * Convert a definition back to creation input (used when deriving versions).
 */
export function toClassDefinitionInput(definition: ClassDefinition): ClassDefinitionInput {
    return {
        classId            : definition.classId,
        name               : definition.name,
        description        : definition.description,
        morphometricParams : Array.from(definition.morphometricParams.values()),
        technologicalParams: Array.from(definition.technologicalParams.values()),
        optionalFeatures   : new Map(definition.optionalFeatures),
        confidenceThreshold: definition.confidenceThreshold,
        createdAt          : definition.createdAt,
        createdBy          : definition.createdBy,
        validatedSamples   : definition.validatedSamples,
    };
}

/**
 * Iterate every parameter of a class with its namespace, morphometric first.
 */
export function* allParameters(
    definition: ClassDefinition
): Generator<{ namespace: ParameterNamespace; parameter: Parameter }> {
    for (const parameter of definition.morphometricParams.values()) {
        yield { namespace: "morphometric", parameter };
    }
    for (const parameter of definition.technologicalParams.values()) {
        yield { namespace: "technological", parameter };
    }
}

/**
 * Count the parameters across both namespaces.
 */
export function parameterCount(definition: ClassDefinition): number {
    return definition.morphometricParams.size + definition.technologicalParams.size;
}
