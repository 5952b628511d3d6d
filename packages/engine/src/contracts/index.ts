/**
 * @fileoverview Contract barrel exports
 *
 * Data model and collaborator interfaces of the engine.
 *
 * @module @morphotax/engine/contracts
 */

// Features
export type {
    FeatureValue,
    FeatureMap,
    ReferenceArtifact,
    FeatureConversion,
} from "./FeatureMap.js";
export {
    numberFeature,
    booleanFeature,
    getNumber,
    getBoolean,
    featureMapFromRecord,
    createFeatureMap,
    featureMapToRecord,
} from "./FeatureMap.js";

// Parameters
export type { Parameter, ParameterInput } from "./Parameter.js";
export {
    DEFAULT_PARAMETER_UNIT,
    createParameter,
    isWithinBounds,
    scoreParameter,
} from "./Parameter.js";

// Class definitions
export type {
    ClassDefinition,
    ClassDefinitionInput,
    GateInput,
    ParameterNamespace,
} from "./ClassDefinition.js";
export {
    DEFAULT_CONFIDENCE_THRESHOLD,
    createClassDefinition,
    toClassDefinitionInput,
    allParameters,
    parameterCount,
} from "./ClassDefinition.js";

// Classification results
export type {
    ClassificationResult,
    ParameterDiagnostic,
    ParameterStatus,
    GateFailure,
} from "./ClassificationResult.js";
export { compareResults } from "./ClassificationResult.js";

// History
export type {
    ParameterEdit,
    ChangeSet,
    ChangeRecord,
    HistoryAction,
    HistoryEntry,
    ClassificationLogEntry,
    TaxonomyStatistics,
    ClassSummary,
} from "./History.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    RegistryEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

// Logger
export type { EngineLogger } from "./Logger.js";
export { consoleLogger, silentLogger, scopedLogger } from "./Logger.js";
