/**
 * @fileoverview Classification verdicts
 *
 * Reduces a ranked list of class results to the answer a curator reads:
 * a member of some class, a possible member, or nothing.
 *
 * @module domain/verdicts/summarizeClassification
 */

import { getBoolean, type ClassificationResult, type FeatureMap } from "@morphotax/engine";
import { DEFAULT_NEAR_MISS_CONFIDENCE, type AdvisoryFeature } from "../../config/loadPreset.js";

export type Verdict = "member" | "possible" | "none";

export interface VerdictOptions {
    /** Confidence from which a non-member counts as possible (default: 0.5) */
    readonly nearMissConfidence?: number;

    /** Features reported when missing or false */
    readonly advisoryFeatures?: readonly AdvisoryFeature[];

    /** The classified artifact, needed for advisory checks */
    readonly features?: FeatureMap;
}

export interface ClassificationSummary {
    readonly verdict: Verdict;

    /** Highest-ranked member, else the highest-ranked result; null without classes */
    readonly best: ClassificationResult | null;

    /** Every result that is a member, in rank order */
    readonly members: ClassificationResult[];

    /** Advisory features the artifact lacks */
    readonly missingAdvisories: AdvisoryFeature[];
}

/**
 * Summarize ranked results.
 *
 * @param results - Results ranked best first
 *
 * @example
 * ```typescript
 * const ranked = registry.classify(features, { returnAllScores: true });
 * const { verdict, best } = summarizeClassification(ranked, { features });
 * ```
 */
export function summarizeClassification(
    results: readonly ClassificationResult[],
    options: VerdictOptions = {}
): ClassificationSummary {
    const nearMissConfidence = options.nearMissConfidence ?? DEFAULT_NEAR_MISS_CONFIDENCE;
    const members = results.filter((result) => result.isMember);
    const best = members[0] ?? results[0] ?? null;

    let verdict: Verdict = "none";
    if (members.length > 0) {
        verdict = "member";
    }
    else if (best && best.confidence >= nearMissConfidence) {
        verdict = "possible";
    }

    const features = options.features;
    const missingAdvisories = (options.advisoryFeatures ?? []).filter((advisory) =>
        features === undefined || getBoolean(features, advisory.feature) !== true
    );

    return { verdict, best, members, missingAdvisories };
}
