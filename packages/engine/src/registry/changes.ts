/**
 * @fileoverview Change application and version naming
 *
 * Turns a ChangeSet into a candidate class definition and allocates the
 * next version id for a class lineage.
 *
 * @module @morphotax/engine/registry/changes
 */

import type { ClassDefinition, ParameterNamespace } from "../contracts/ClassDefinition.js";
import { createClassDefinition, toClassDefinitionInput } from "../contracts/ClassDefinition.js";
import type { ChangeSet, ParameterEdit } from "../contracts/History.js";
import type { Parameter, ParameterInput } from "../contracts/Parameter.js";
import { InvalidChangeError, isTaxonomyError } from "../errors/TaxonomyError.js";

const VERSION_SUFFIX = /_v(\d+)$/;

/**
 * Strip a trailing `_v<digits>` version suffix.
 *
 * @example
 * ```typescript
 * baseClassId("TYPE_A_v3"); // "TYPE_A"
 * baseClassId("TYPE_A");    // "TYPE_A"
 * ```
 */
export function baseClassId(classId: string): string {
    return classId.replace(VERSION_SUFFIX, "");
}

/**
 * Version ordinal of an id; an unsuffixed id is version 1.
 */
export function versionOf(classId: string): number {
    const match = VERSION_SUFFIX.exec(classId);
    return match ? Number.parseInt(match[1], 10) : 1;
}

/**
 * Allocate the next version id for the lineage of `classId`.
 *
 * @param classId - Any version of the lineage
 * @param existingIds - Every id currently registered
 * @returns `<base>_v<n>` where n is one more than the highest existing version
 */
export function nextVersionId(classId: string, existingIds: Iterable<string>): string {
    const base = baseClassId(classId);
    let highest = 1;

    for (const id of existingIds) {
        if (baseClassId(id) === base) {
            highest = Math.max(highest, versionOf(id));
        }
    }

    return `${base}_v${highest + 1}`;
}

function freezeEdits(
    edits: Readonly<Record<string, ParameterEdit>> | undefined
): Readonly<Record<string, ParameterEdit>> | undefined {
    if (edits === undefined) {
        return undefined;
    }
    return Object.freeze(Object.fromEntries(
        Object.entries(edits).map(([name, edit]) => [name, Object.freeze({ ...edit })])
    ));
}

/**
 * Deep, frozen copy of a change set.
 */
export function freezeChangeSet(changes: ChangeSet): ChangeSet {
    const frozen: {
        morphometric?: Readonly<Record<string, ParameterEdit>>;
        technological?: Readonly<Record<string, ParameterEdit>>;
        gates?: Readonly<Record<string, boolean | null>>;
    } = {};

    const morphometric = freezeEdits(changes.morphometric);
    if (morphometric) {
        frozen.morphometric = morphometric;
    }
    const technological = freezeEdits(changes.technological);
    if (technological) {
        frozen.technological = technological;
    }
    if (changes.gates !== undefined) {
        frozen.gates = Object.freeze({ ...changes.gates });
    }

    return Object.freeze(frozen);
}

function applyEdits(
    namespace: ParameterNamespace,
    current: ReadonlyMap<string, Parameter>,
    edits: Readonly<Record<string, ParameterEdit>> | undefined,
    classId: string
): ParameterInput[] {
    const pending = new Map(Object.entries(edits ?? {}));

    for (const name of pending.keys()) {
        if (!current.has(name)) {
            throw new InvalidChangeError(classId, `no ${namespace} parameter named "${name}"`, name);
        }
    }

    return Array.from(current.values()).map((parameter) => {
        const edit = pending.get(parameter.name);
        return edit ? { ...parameter, ...edit, name: parameter.name } : parameter;
    });
}

/**
 * Options for the candidate produced by a change.
 */
export interface CandidateOptions {
    /** Id for the candidate (the caller allocates it) */
    readonly classId: string;
    readonly createdBy: string;
    readonly createdAt: Date;
}

/**
 * Apply a change set to a class, producing a new (unregistered) definition.
 *
 * Name, description, threshold and validated samples carry over; parameters
 * and gates take the edits. The hash is recomputed by construction.
 *
 * @throws InvalidChangeError if an edit names an unknown parameter or
 *         leaves a parameter violating its invariants
 */
export function applyChangeSet(
    definition: ClassDefinition,
    changes: ChangeSet,
    options: CandidateOptions
): ClassDefinition {
    const morphometricParams = applyEdits("morphometric", definition.morphometricParams, changes.morphometric, definition.classId);
    const technologicalParams = applyEdits("technological", definition.technologicalParams, changes.technological, definition.classId);

    const gates = new Map(definition.optionalFeatures);
    for (const [feature, required] of Object.entries(changes.gates ?? {})) {
        if (required === null) {
            gates.delete(feature);
        }
        else {
            gates.set(feature, required);
        }
    }

    try {
        return createClassDefinition({
            ...toClassDefinitionInput(definition),
            classId         : options.classId,
            morphometricParams,
            technologicalParams,
            optionalFeatures: gates,
            createdAt       : options.createdAt,
            createdBy       : options.createdBy,
        });
    }
    catch (error) {
        if (isTaxonomyError(error)) {
            const parameter = typeof error.context.parameter === "string" ? error.context.parameter : undefined;
            throw new InvalidChangeError(definition.classId, error.message, parameter);
        }
        throw error;
    }
}
