/**
 * History Contract
 *
 * The audit trail a registry keeps: change records linking superseded
 * classes to their successors, a version history of every mutation, and a
 * log of classification requests.
 *
 * All records are plain serializable data with ISO timestamps.
 */

import type { ParameterNamespace } from "./ClassDefinition.js";

/**
 * Fields of a parameter that a modification may set.
 */
export interface ParameterEdit {
    readonly targetValue?: number;
    readonly minThreshold?: number;
    readonly maxThreshold?: number;
    readonly tolerance?: number;
    readonly weight?: number;
    readonly unit?: string;
}

/**
 * A requested modification of a class.
 *
 * @example
 * ```typescript
 * const widenLength: ChangeSet = {
 *     morphometric: { length: { maxThreshold: 135 } },
 *     gates: { has_midrib: null },   // remove the gate
 * };
 * ```
 */
export interface ChangeSet {
    readonly morphometric?: Readonly<Record<string, ParameterEdit>>;
    readonly technological?: Readonly<Record<string, ParameterEdit>>;

    /** Required value per gate; null removes the gate */
    readonly gates?: Readonly<Record<string, boolean | null>>;
}

/**
 * Link between a superseded class and the version that replaced it.
 */
export interface ChangeRecord {
    readonly fromClassId: string;
    readonly toClassId: string;
    readonly fromHash: string;
    readonly toHash: string;
    readonly justification: string;
    readonly operator: string;
    readonly timestamp: string;
    readonly changes: ChangeSet;
}

export type HistoryAction = "create" | "modify" | "import";

/**
 * One entry of the version history.
 */
export interface HistoryEntry {
    readonly action: HistoryAction;
    readonly classId: string;
    readonly contentHash: string;
    readonly timestamp: string;

    /** Previous version (modify only) */
    readonly previousClassId?: string;

    /** Number of validated samples at creation */
    readonly sampleCount?: number;
}

/**
 * One entry of the classification log.
 */
export interface ClassificationLogEntry {
    readonly artifactId: string;

    /** Highest-ranked class, null when the registry was empty */
    readonly bestMatch: string | null;

    readonly confidence: number;

    readonly isMember: boolean;

    readonly timestamp: string;
}

/**
 * Registry statistics.
 */
export interface TaxonomyStatistics {
    readonly classCount: number;
    readonly currentClassCount: number;
    readonly totalClassifications: number;
    readonly totalModifications: number;
    readonly classes: readonly ClassSummary[];
}

export interface ClassSummary {
    readonly classId: string;
    readonly name: string;
    readonly contentHash: string;
    readonly validatedSampleCount: number;
    readonly parameterCount: number;
    readonly parameterCounts: Readonly<Record<ParameterNamespace, number>>;
    readonly gateCount: number;
    readonly confidenceThreshold: number;
    readonly supersedes: string | null;
    readonly supersededBy: string | null;
}
