/**
 * @fileoverview Verdict barrel exports
 *
 * @module domain/verdicts
 */

export {
    summarizeClassification,
    type Verdict,
    type VerdictOptions,
    type ClassificationSummary,
} from "./summarizeClassification.js";
