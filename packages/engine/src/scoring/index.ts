/**
 * @fileoverview Scoring barrel exports
 *
 * @module @morphotax/engine/scoring
 */

export {
    classify,
    classifyAll,
    evaluateGates,
    rankResults,
} from "./Scorer.js";
