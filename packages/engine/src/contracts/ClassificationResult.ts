/**
 * Classification Result
 *
 * The transient outcome of scoring one artifact against one class.
 * Results are never persisted by the engine; the registry only keeps a
 * short log entry per classification request.
 */

import type { ParameterNamespace } from "./ClassDefinition.js";

/**
 * Why a parameter scored what it did.
 */
export type ParameterStatus = "match" | "out-of-range" | "missing";

/**
 * Per-parameter explanation.
 */
export interface ParameterDiagnostic {
    readonly namespace: ParameterNamespace;

    /** Measured value, null when the artifact lacks it */
    readonly observed: number | null;

    /** Hard bounds [min, max] */
    readonly expectedRange: readonly [number, number];

    readonly target: number;

    readonly tolerance: number;

    readonly weight: number;

    /** Score in [0, 1] contributed by this parameter */
    readonly score: number;

    readonly status: ParameterStatus;
}

/**
 * A gate the artifact did not satisfy.
 */
export interface GateFailure {
    readonly feature: string;

    readonly expected: boolean;

    /** Observed boolean, null when missing or not a boolean */
    readonly observed: boolean | null;
}

/**
 * Outcome of scoring one artifact against one class.
 */
export interface ClassificationResult {
    readonly classId: string;

    readonly className: string;

    readonly isMember: boolean;

    /** Weighted-average match score in [0, 1] */
    readonly confidence: number;

    /** Empty when every gate passed */
    readonly gateFailures: readonly GateFailure[];

    /** Empty when a gate failed (parameters are not scored) */
    readonly diagnostic: ReadonlyMap<string, ParameterDiagnostic>;
}

/**
 * Ordering used for ranked results: confidence descending, then class id
 * ascending so equal confidences always come out in the same order.
 */
export function compareResults(a: ClassificationResult, b: ClassificationResult): number {
    if (a.confidence !== b.confidence) {
        return b.confidence - a.confidence;
    }
    if (a.classId < b.classId) {
        return -1;
    }
    return a.classId > b.classId ? 1 : 0;
}
