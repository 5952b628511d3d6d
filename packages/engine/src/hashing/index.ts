/**
 * @fileoverview Hashing barrel exports
 *
 * @module @morphotax/engine/hashing
 */

export {
    canonicalEncoding,
    computeContentHash,
    formatCanonicalNumber,
    type HashableContent,
} from "./contentHash.js";
