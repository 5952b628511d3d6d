/**
 * @fileoverview Builder barrel exports
 *
 * @module @morphotax/engine/builder
 */

export {
    buildClassFromReferenceGroup,
    defineFromReferenceGroup,
    defaultClassId,
    DEFAULT_TECHNOLOGICAL_KEYS,
    DEFAULT_TOLERANCE_FACTOR,
    MIN_REFERENCE_OBJECTS,
    type BuildOptions,
    type BuildOutcome,
    type DroppedKey,
    type DroppedKeyReason,
} from "./ClassBuilder.js";
