/**
 * @fileoverview Feature file loader
 *
 * Loads measured artifacts from JSON or YAML.
 *
 * Accepted shapes:
 * - `{ id?, features: { ... } }` (one artifact)
 * - `{ id?, length: 120, ... }` (one artifact, features inline)
 * - a list of either
 * - `{ artifacts: [ ... ] }`
 *
 * @module config/loadArtifacts
 */

import { z } from "zod";
import { featureMapFromRecord, type ReferenceArtifact } from "@morphotax/engine";
import { readStructuredFile } from "./readStructuredFile.js";

const IdSchema = z.union([z.string().min(1), z.number()]).transform(String);

const RecordSchema = z.record(z.unknown());

const WrappedArtifactSchema = z.object({
    id      : IdSchema.optional(),
    features: RecordSchema,
});

const ListSchema = z.array(RecordSchema);

const WrappedListSchema = z.object({ artifacts: ListSchema });

/**
 * Artifacts read from a file plus conversion warnings.
 */
export interface LoadedArtifacts {
    readonly artifacts: ReferenceArtifact[];

    /** One line per feature value that was neither a number nor a boolean */
    readonly warnings: string[];
}

function entriesOf(content: unknown): Record<string, unknown>[] | null {
    const list = ListSchema.safeParse(content);
    if (list.success) {
        return list.data;
    }

    const wrapped = WrappedListSchema.safeParse(content);
    if (wrapped.success) {
        return wrapped.data.artifacts;
    }

    const single = RecordSchema.safeParse(content);
    return single.success ? [single.data] : null;
}

/**
 * Convert parsed file content into artifacts.
 *
 * @param content - Parsed JSON/YAML
 * @param source - Name used in messages (usually the path)
 */
export function artifactsFromContent(content: unknown, source: string): LoadedArtifacts {
    const entries = entriesOf(content);
    if (!entries) {
        throw new Error(`Invalid feature file ${source}: expected an artifact, a list of artifacts or { artifacts: [...] }`);
    }

    const artifacts: ReferenceArtifact[] = [];
    const warnings: string[] = [];

    entries.forEach((entry, index) => {
        const wrapped = WrappedArtifactSchema.safeParse(entry);
        let id: string | undefined;
        let record: Record<string, unknown>;

        if (wrapped.success) {
            id = wrapped.data.id;
            record = wrapped.data.features;
        }
        else {
            const inlineId = IdSchema.safeParse(entry.id);
            id = inlineId.success ? inlineId.data : undefined;
            record = entry;
        }

        const { features, skipped } = featureMapFromRecord(record, ["id"]);
        const label = id ?? `#${index + 1}`;
        for (const key of skipped) {
            warnings.push(`${source} ${label}: skipped feature "${key}" (not a number or boolean)`);
        }

        artifacts.push(id === undefined ? { features } : { id, features });
    });

    return { artifacts, warnings };
}

/**
 * Load artifacts from a JSON or YAML file.
 *
 * @throws Error naming the path if the file is missing or has another shape
 *
 * @example
 * ```typescript
 * const { artifacts, warnings } = loadArtifacts("./data/hoard.yml");
 * registry.defineClass("Hoard axes", artifacts);
 * ```
 */
export function loadArtifacts(filePath: string): LoadedArtifacts {
    return artifactsFromContent(readStructuredFile(filePath), filePath);
}
