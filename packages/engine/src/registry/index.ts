/**
 * @fileoverview Registry barrel exports
 *
 * @module @morphotax/engine/registry
 */

export {
    TaxonomyRegistry,
    DEFAULT_MIN_CLUSTER_SIZE,
    DEFAULT_NOISE_LABEL,
    type RegistryConfig,
    type ImportOptions,
    type ClassifyOptions,
    type ModifyOutcome,
    type DiscoverOptions,
    type DiscoveryOutcome,
    type RejectedCluster,
} from "./TaxonomyRegistry.js";
export {
    applyChangeSet,
    baseClassId,
    freezeChangeSet,
    nextVersionId,
    versionOf,
    type CandidateOptions,
} from "./changes.js";
