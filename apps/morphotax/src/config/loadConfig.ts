/**
 * @fileoverview Application configuration
 *
 * Settings come from the environment (a `.env` file is loaded by
 * `dotenv/config` at startup) and are overridden by command-line flags.
 *
 * @module config/loadConfig
 */

import { z } from "zod";

/**
 * Raised when an environment variable holds an unusable value.
 */
export class ConfigurationError extends Error {
    public readonly variable: string;

    constructor(variable: string, reason: string) {
        super(`Invalid configuration ${variable}: ${reason}`);
        this.name = "ConfigurationError";
        this.variable = variable;
    }
}

// Empty variables (FOO=) count as unset.
const unsetWhenEmpty = (value: unknown) => (value === "" ? undefined : value);

const optionalText = z.preprocess(unsetWhenEmpty, z.string().optional());

const EnvSchema = z.object({
    MORPHOTAX_TAXONOMY        : z.preprocess(unsetWhenEmpty, z.string().default("./taxonomy.json")),
    MORPHOTAX_DATABASE        : z.preprocess(unsetWhenEmpty, z.string().default("./morphotax.db")),
    MORPHOTAX_OPERATOR        : optionalText,
    MORPHOTAX_TOLERANCE_FACTOR: z.preprocess(unsetWhenEmpty, z.coerce.number().positive().default(0.15)),
    MORPHOTAX_MIN_CLUSTER_SIZE: z.preprocess(unsetWhenEmpty, z.coerce.number().int().min(2).default(5)),
    OPENAI_API_KEY            : optionalText,
    MORPHOTAX_OPENAI_MODEL    : z.preprocess(unsetWhenEmpty, z.string().default("gpt-4o-mini")),
});

/**
 * Application configuration
 */
export interface AppConfig {
    /** Taxonomy document on disk */
    readonly taxonomyPath: string;

    /** SQLite classification archive */
    readonly databasePath: string;

    /** Default operator for modifications */
    readonly operator?: string;

    /** Builder tolerance factor */
    readonly toleranceFactor: number;

    /** Smallest cluster promoted by discover */
    readonly minClusterSize: number;

    readonly openai: {
        readonly apiKey?: string;
        readonly model: string;
    };
}

/**
 * Read configuration from an environment.
 *
 * @param env - Variables to read (default: process.env)
 * @throws ConfigurationError naming the first invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);

    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new ConfigurationError(String(issue?.path[0] ?? "environment"), issue?.message ?? "invalid value");
    }

    const values = parsed.data;

    return {
        taxonomyPath   : values.MORPHOTAX_TAXONOMY,
        databasePath   : values.MORPHOTAX_DATABASE,
        operator       : values.MORPHOTAX_OPERATOR,
        toleranceFactor: values.MORPHOTAX_TOLERANCE_FACTOR,
        minClusterSize : values.MORPHOTAX_MIN_CLUSTER_SIZE,
        openai         : {
            apiKey: values.OPENAI_API_KEY,
            model : values.MORPHOTAX_OPENAI_MODEL,
        },
    };
}
