/**
 * @fileoverview Morphotax Engine
 *
 * Parametric classification of measured artifacts into versioned,
 * content-hashed taxonomic classes.
 *
 * The engine provides:
 * - Weighted-tolerance scoring with hard bounds and boolean gates
 * - Class derivation from reference groups and from external clusters
 * - Immutable versioning with change records and lineage
 * - A portable, validated export document
 *
 * @module @morphotax/engine
 * @example
 * ```typescript
 * import { TaxonomyRegistry, createFeatureMap } from "@morphotax/engine";
 *
 * const registry = new TaxonomyRegistry();
 * registry.defineClass("Flanged axe", [
 *     { id: "AXE_1", features: createFeatureMap({ length: 120, width: 65 }) },
 *     { id: "AXE_2", features: createFeatureMap({ length: 122, width: 65 }) },
 * ]);
 *
 * const best = registry.classify(createFeatureMap({ length: 121, width: 65 }));
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Error exports
// ============================================================================

export * from "./errors/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";

export * from "./utils/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./hashing/index.js";

export * from "./scoring/index.js";

export * from "./builder/index.js";

export * from "./registry/index.js";

export * from "./serialization/index.js";
