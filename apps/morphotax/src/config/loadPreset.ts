/**
 * @fileoverview Preset taxonomy loader
 *
 * Loads hand-written class definitions from YAML configuration files.
 * A preset carries explicit parameters and gates per class, plus advisory
 * features: booleans that are reported when absent but never reject.
 *
 * @module config/loadPreset
 */

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
    createClassDefinition,
    isTaxonomyError,
    type ClassDefinition,
} from "@morphotax/engine";
import { readStructuredFile } from "./readStructuredFile.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * Directory of the bundled presets.
 */
export const PRESETS_DIR = join(__dirname, "..", "..", "config", "presets");

export const DEFAULT_NEAR_MISS_CONFIDENCE = 0.5;

const ParameterSchema = z.object({
    name        : z.string().min(1),
    targetValue : z.number(),
    minThreshold: z.number(),
    maxThreshold: z.number(),
    tolerance   : z.number(),
    weight      : z.number().optional(),
    unit        : z.string().optional(),
});

const PresetClassSchema = z.object({
    classId            : z.string().min(1),
    name               : z.string().min(1),
    description        : z.string().default(""),
    confidenceThreshold: z.number().optional(),
    createdBy          : z.string().default("preset"),
    validatedSamples   : z.array(z.string()).default([]),
    gates              : z.record(z.boolean()).default({}),
    morphometric       : z.array(ParameterSchema).default([]),
    technological      : z.array(ParameterSchema).default([]),
});

const AdvisoryFeatureSchema = z.object({
    feature: z.string().min(1),
    label  : z.string().optional(),
});

const PresetFileSchema = z.object({
    name              : z.string().min(1),
    description       : z.string().default(""),
    nearMissConfidence: z.number().min(0).max(1).default(DEFAULT_NEAR_MISS_CONFIDENCE),
    advisoryFeatures  : z.array(AdvisoryFeatureSchema).default([]),
    classes           : z.array(PresetClassSchema).min(1),
});

/**
 * A boolean feature that is expected but not required.
 */
export interface AdvisoryFeature {
    readonly feature: string;

    /** Human-readable name for reports (default: the feature key) */
    readonly label: string;
}

/**
 * A loaded preset.
 */
export interface Preset {
    readonly name: string;
    readonly description: string;
    readonly classes: ClassDefinition[];
    readonly advisoryFeatures: AdvisoryFeature[];

    /** Confidence at which a non-member is still reported as possible */
    readonly nearMissConfidence: number;
}

/**
 * Convert parsed preset content.
 *
 * @throws Error naming the source and the offending class or field
 */
export function presetFromContent(content: unknown, source: string, now: Date = new Date()): Preset {
    const parsed = PresetFileSchema.safeParse(content);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid preset ${source}: ${issue?.path.join(".") ?? ""}: ${issue?.message ?? "unknown problem"}`);
    }

    const preset = parsed.data;

    const classes = preset.classes.map((raw) => {
        try {
            return createClassDefinition({
                classId            : raw.classId,
                name               : raw.name,
                description        : raw.description,
                morphometricParams : raw.morphometric,
                technologicalParams: raw.technological,
                optionalFeatures   : raw.gates,
                confidenceThreshold: raw.confidenceThreshold,
                createdAt          : now,
                createdBy          : raw.createdBy,
                validatedSamples   : raw.validatedSamples,
            });
        }
        catch (error) {
            if (isTaxonomyError(error)) {
                throw new Error(`Invalid preset ${source}: ${error.message}`);
            }
            throw error;
        }
    });

    return {
        name              : preset.name,
        description       : preset.description,
        classes,
        advisoryFeatures  : preset.advisoryFeatures.map((advisory) => ({
            feature: advisory.feature,
            label  : advisory.label ?? advisory.feature,
        })),
        nearMissConfidence: preset.nearMissConfidence,
    };
}

/**
 * Resolve a preset argument: a bundled preset name or a file path.
 *
 * @example
 * ```typescript
 * resolvePresetPath("savignano");          // <app>/config/presets/savignano.yml
 * resolvePresetPath("./my-presets/a.yml"); // unchanged
 * ```
 */
export function resolvePresetPath(nameOrPath: string): string {
    return /^[\w-]+$/.test(nameOrPath) ? join(PRESETS_DIR, `${nameOrPath}.yml`) : nameOrPath;
}

/**
 * Load a preset from a YAML (or JSON) file.
 */
export function loadPreset(filePath: string): Preset {
    return presetFromContent(readStructuredFile(filePath), filePath);
}
