/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export { loadConfig, ConfigurationError, type AppConfig } from "./loadConfig.js";
export { loadArtifacts, artifactsFromContent, type LoadedArtifacts } from "./loadArtifacts.js";
export { loadClusters, clustersFromContent } from "./loadClusters.js";
export {
    loadPreset,
    presetFromContent,
    resolvePresetPath,
    PRESETS_DIR,
    DEFAULT_NEAR_MISS_CONFIDENCE,
    type Preset,
    type AdvisoryFeature,
} from "./loadPreset.js";
export { readStructuredFile, formatOf, type StructuredFormat } from "./readStructuredFile.js";
