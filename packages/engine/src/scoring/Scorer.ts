/**
 * @fileoverview Scorer
 *
 * Weighted-tolerance matching of an artifact against class definitions.
 *
 * Algorithm per class:
 * 1. Gates: every required boolean must be present and equal, otherwise
 *    the class is rejected with confidence 0 and no parameter is scored
 * 2. Every parameter (both namespaces) is scored in [0, 1]
 * 3. Confidence = sum(weight * score) / sum(weight); 0 when the weights sum to 0
 * 4. Member when confidence >= the class threshold
 *
 * Zero-weight parameters still appear in the diagnostic (and their hard
 * bounds are reported) but add nothing to either sum.
 *
 * @module @morphotax/engine/scoring/Scorer
 */

import type { ClassDefinition } from "../contracts/ClassDefinition.js";
import { allParameters } from "../contracts/ClassDefinition.js";
import type {
    ClassificationResult,
    GateFailure,
    ParameterDiagnostic,
} from "../contracts/ClassificationResult.js";
import { compareResults } from "../contracts/ClassificationResult.js";
import type { FeatureMap } from "../contracts/FeatureMap.js";
import { getBoolean, getNumber } from "../contracts/FeatureMap.js";
import { isWithinBounds, scoreParameter } from "../contracts/Parameter.js";

/**
 * Evaluate the boolean gates of a class.
 *
 * @returns Every unmet gate, in the class's gate order
 */
export function evaluateGates(definition: ClassDefinition, features: FeatureMap): GateFailure[] {
    const failures: GateFailure[] = [];

    for (const [feature, expected] of definition.optionalFeatures) {
        const observed = getBoolean(features, feature);
        if (observed !== expected) {
            failures.push({ feature, expected, observed: observed ?? null });
        }
    }

    return failures;
}

/**
 * Score an artifact against one class.
 *
 * @param definition - The class to test
 * @param features - The artifact's measurements
 * @returns Membership, confidence and diagnostics
 *
 * @example
 * ```typescript
 * const result = classify(socketedAxe, createFeatureMap({ length: 165, has_socket: true }));
 * if (result.isMember) {
 *     console.log(`${result.className}: ${(result.confidence * 100).toFixed(0)}%`);
 * }
 * ```
 */
export function classify(definition: ClassDefinition, features: FeatureMap): ClassificationResult {
    const gateFailures = evaluateGates(definition, features);

    if (gateFailures.length > 0) {
        return Object.freeze({
            classId     : definition.classId,
            className   : definition.name,
            isMember    : false,
            confidence  : 0.0,
            gateFailures: Object.freeze(gateFailures),
            diagnostic  : new Map<string, ParameterDiagnostic>(),
        });
    }

    const diagnostic = new Map<string, ParameterDiagnostic>();
    let weightedScore = 0;
    let totalWeight = 0;

    for (const { namespace, parameter } of allParameters(definition)) {
        const observed = getNumber(features, parameter.name);
        const score = scoreParameter(parameter, observed);

        weightedScore += parameter.weight * score;
        totalWeight += parameter.weight;

        let status: ParameterDiagnostic["status"] = "match";
        if (observed === undefined) {
            status = "missing";
        }
        else if (!isWithinBounds(parameter, observed)) {
            status = "out-of-range";
        }

        diagnostic.set(parameter.name, {
            namespace,
            observed     : observed ?? null,
            expectedRange: [parameter.minThreshold, parameter.maxThreshold],
            target       : parameter.targetValue,
            tolerance    : parameter.tolerance,
            weight       : parameter.weight,
            score,
            status,
        });
    }

    const confidence = totalWeight > 0
        ? Math.min(1.0, Math.max(0.0, weightedScore / totalWeight))
        : 0.0;

    return Object.freeze({
        classId     : definition.classId,
        className   : definition.name,
        isMember    : confidence >= definition.confidenceThreshold,
        confidence,
        gateFailures: Object.freeze([]),
        diagnostic,
    });
}

/**
 * Score an artifact against every class and rank the results.
 *
 * @returns Results sorted by confidence descending, ties by class id ascending
 */
export function classifyAll(
    definitions: Iterable<ClassDefinition>,
    features: FeatureMap
): ClassificationResult[] {
    const results: ClassificationResult[] = [];
    for (const definition of definitions) {
        results.push(classify(definition, features));
    }
    return rankResults(results);
}

/**
 * Sort results into the canonical ranking without mutating the input.
 */
export function rankResults(results: readonly ClassificationResult[]): ClassificationResult[] {
    return [...results].sort(compareResults);
}
