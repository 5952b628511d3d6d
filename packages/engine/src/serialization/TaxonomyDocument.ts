/**
 * @fileoverview Portable taxonomy document
 *
 * The export format is the only externally observable artifact of the
 * engine, so its shape is pinned by a zod schema and a format version.
 * Decoding validates everything (shape, parameter invariants, recomputed
 * hashes, supersession links) before anything is handed to a registry.
 *
 * @module @morphotax/engine/serialization/TaxonomyDocument
 */

import { z } from "zod";
import type { ClassDefinition } from "../contracts/ClassDefinition.js";
import { createClassDefinition } from "../contracts/ClassDefinition.js";
import type {
    ChangeRecord,
    ChangeSet,
    ClassificationLogEntry,
    HistoryEntry,
} from "../contracts/History.js";
import type { Parameter } from "../contracts/Parameter.js";
import {
    InvalidChangeError,
    MalformedImportError,
    isTaxonomyError,
    type ImportIssue,
} from "../errors/TaxonomyError.js";

export const TAXONOMY_FORMAT_VERSION = 1;

// =============================================================================
// Schemas
// =============================================================================

const finite = z.number().finite();

const isoTimestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
    message: "expected an ISO-8601 timestamp",
});

export const ParameterDocumentSchema = z.object({
    name        : z.string().min(1),
    targetValue : finite,
    minThreshold: finite,
    maxThreshold: finite,
    tolerance   : finite,
    weight      : finite,
    unit        : z.string().default("mm"),
});

export const ClassDocumentSchema = z.object({
    classId            : z.string().min(1),
    name               : z.string(),
    description        : z.string().default(""),
    contentHash        : z.string().min(1),
    morphometricParams : z.record(ParameterDocumentSchema).default({}),
    technologicalParams: z.record(ParameterDocumentSchema).default({}),
    optionalFeatures   : z.record(z.boolean()).default({}),
    confidenceThreshold: finite,
    createdAt          : isoTimestamp,
    createdBy          : z.string().default(""),
    validatedSamples   : z.array(z.string()).default([]),
    supersedes         : z.string().nullable().default(null),
    supersededBy       : z.string().nullable().default(null),
});

export const ParameterEditSchema = z.object({
    targetValue : finite.optional(),
    minThreshold: finite.optional(),
    maxThreshold: finite.optional(),
    tolerance   : finite.optional(),
    weight      : finite.optional(),
    unit        : z.string().optional(),
}).strict();

export const ChangeSetSchema = z.object({
    morphometric : z.record(ParameterEditSchema).optional(),
    technological: z.record(ParameterEditSchema).optional(),
    gates        : z.record(z.boolean().nullable()).optional(),
}).strict();

export const ChangeRecordSchema = z.object({
    fromClassId  : z.string().min(1),
    toClassId    : z.string().min(1),
    fromHash     : z.string(),
    toHash       : z.string(),
    justification: z.string(),
    operator     : z.string(),
    timestamp    : isoTimestamp,
    changes      : ChangeSetSchema,
});

export const HistoryEntrySchema = z.object({
    action         : z.enum(["create", "modify", "import"]),
    classId        : z.string(),
    contentHash    : z.string(),
    timestamp      : isoTimestamp,
    previousClassId: z.string().optional(),
    sampleCount    : z.number().int().nonnegative().optional(),
});

export const ClassificationLogEntrySchema = z.object({
    artifactId: z.string(),
    bestMatch : z.string().nullable(),
    confidence: finite,
    isMember  : z.boolean(),
    timestamp : isoTimestamp,
});

export const TaxonomyDocumentSchema = z.object({
    formatVersion    : z.literal(TAXONOMY_FORMAT_VERSION),
    exportedAt       : isoTimestamp,
    classes          : z.record(ClassDocumentSchema),
    classOrder       : z.array(z.string()),
    changeRecords    : z.array(ChangeRecordSchema).default([]),
    history          : z.array(HistoryEntrySchema).default([]),
    classificationLog: z.array(ClassificationLogEntrySchema).default([]),
});

export type ParameterDocument = z.infer<typeof ParameterDocumentSchema>;
export type ClassDocument = z.infer<typeof ClassDocumentSchema>;
export type TaxonomyDocument = z.infer<typeof TaxonomyDocumentSchema>;

// =============================================================================
// Encoding
// =============================================================================

/**
 * Supersession links stored alongside a class.
 */
export interface ClassLinks {
    readonly supersedes: string | null;
    readonly supersededBy: string | null;
}

/**
 * A registry entry as it travels through the document.
 */
export interface DecodedClass extends ClassLinks {
    readonly definition: ClassDefinition;
}

/**
 * Everything a registry needs to restore its state.
 */
export interface DecodedTaxonomy {
    readonly classes: readonly DecodedClass[];
    readonly changeRecords: readonly ChangeRecord[];
    readonly history: readonly HistoryEntry[];
    readonly classificationLog: readonly ClassificationLogEntry[];
}

function parameterToDocument(parameter: Parameter): ParameterDocument {
    return {
        name        : parameter.name,
        targetValue : parameter.targetValue,
        minThreshold: parameter.minThreshold,
        maxThreshold: parameter.maxThreshold,
        tolerance   : parameter.tolerance,
        weight      : parameter.weight,
        unit        : parameter.unit,
    };
}

function parametersToDocument(params: ReadonlyMap<string, Parameter>): Record<string, ParameterDocument> {
    const record: Record<string, ParameterDocument> = {};
    for (const [name, parameter] of params) {
        record[name] = parameterToDocument(parameter);
    }
    return record;
}

/**
 * Encode one class with its links.
 */
export function classToDocument(definition: ClassDefinition, links: ClassLinks): ClassDocument {
    return {
        classId            : definition.classId,
        name               : definition.name,
        description        : definition.description,
        contentHash        : definition.contentHash,
        morphometricParams : parametersToDocument(definition.morphometricParams),
        technologicalParams: parametersToDocument(definition.technologicalParams),
        optionalFeatures   : Object.fromEntries(definition.optionalFeatures),
        confidenceThreshold: definition.confidenceThreshold,
        createdAt          : definition.createdAt.toISOString(),
        createdBy          : definition.createdBy,
        validatedSamples   : [...definition.validatedSamples],
        supersedes         : links.supersedes,
        supersededBy       : links.supersededBy,
    };
}

/**
 * Assemble a full document.
 */
export function encodeTaxonomy(taxonomy: DecodedTaxonomy, exportedAt: Date = new Date()): TaxonomyDocument {
    const classes: Record<string, ClassDocument> = {};
    const classOrder: string[] = [];

    for (const entry of taxonomy.classes) {
        classes[entry.definition.classId] = classToDocument(entry.definition, entry);
        classOrder.push(entry.definition.classId);
    }

    return {
        formatVersion    : TAXONOMY_FORMAT_VERSION,
        exportedAt       : exportedAt.toISOString(),
        classes,
        classOrder,
        changeRecords    : taxonomy.changeRecords.map((record) => ({ ...record })),
        history          : taxonomy.history.map((entry) => ({ ...entry })),
        classificationLog: taxonomy.classificationLog.map((entry) => ({ ...entry })),
    };
}

// =============================================================================
// Decoding
// =============================================================================

function issuesFromZod(error: z.ZodError, prefix: readonly (string | number)[] = []): ImportIssue[] {
    return error.issues.map((issue) => {
        const path = [...prefix, ...issue.path].map(String);
        const classId = path[0] === "classes" ? path[1] : undefined;
        const parameter = path[0] === "classes" && path[2]?.endsWith("Params") ? path[3] : undefined;

        return {
            path   : path.join(".") || "(root)",
            message: issue.message,
            classId,
            parameter,
        };
    });
}

function classFromDocument(key: string, doc: ClassDocument, issues: ImportIssue[]): ClassDefinition | null {
    if (doc.classId !== key) {
        issues.push({
            path   : `classes.${key}.classId`,
            message: `class id "${doc.classId}" does not match its key`,
            classId: key,
        });
        return null;
    }

    try {
        const definition = createClassDefinition({
            classId            : doc.classId,
            name               : doc.name,
            description        : doc.description,
            morphometricParams : Object.values(doc.morphometricParams),
            technologicalParams: Object.values(doc.technologicalParams),
            optionalFeatures   : doc.optionalFeatures,
            confidenceThreshold: doc.confidenceThreshold,
            createdAt          : new Date(doc.createdAt),
            createdBy          : doc.createdBy,
            validatedSamples   : doc.validatedSamples,
        });

        if (definition.contentHash !== doc.contentHash) {
            issues.push({
                path   : `classes.${key}.contentHash`,
                message: `stored hash ${doc.contentHash} does not match recomputed hash ${definition.contentHash}`,
                classId: key,
            });
            return null;
        }

        return definition;
    }
    catch (error) {
        if (isTaxonomyError(error)) {
            const parameter = typeof error.context.parameter === "string" ? error.context.parameter : undefined;
            issues.push({ path: `classes.${key}`, message: error.message, classId: key, parameter });
            return null;
        }
        throw error;
    }
}

function checkParameterKeys(key: string, doc: ClassDocument, issues: ImportIssue[]): void {
    for (const field of ["morphometricParams", "technologicalParams"] as const) {
        for (const [name, parameter] of Object.entries(doc[field])) {
            if (parameter.name !== name) {
                issues.push({
                    path     : `classes.${key}.${field}.${name}.name`,
                    message  : `parameter name "${parameter.name}" does not match its key`,
                    classId  : key,
                    parameter: name,
                });
            }
        }
    }
}

function checkLinks(classes: readonly DecodedClass[], records: readonly ChangeRecord[], issues: ImportIssue[]): void {
    const byId = new Map(classes.map((entry) => [entry.definition.classId, entry]));

    for (const entry of classes) {
        const classId = entry.definition.classId;

        if (entry.supersededBy !== null) {
            const successor = byId.get(entry.supersededBy);
            if (!successor || successor.supersedes !== classId) {
                issues.push({
                    path   : `classes.${classId}.supersededBy`,
                    message: `successor ${entry.supersededBy} is missing or does not point back`,
                    classId,
                });
            }
        }

        if (entry.supersedes !== null) {
            const predecessor = byId.get(entry.supersedes);
            if (!predecessor || predecessor.supersededBy === null) {
                issues.push({
                    path   : `classes.${classId}.supersedes`,
                    message: `predecessor ${entry.supersedes} is missing or not marked as superseded`,
                    classId,
                });
            }
        }
    }

    records.forEach((record, index) => {
        for (const id of [record.fromClassId, record.toClassId]) {
            if (!byId.has(id)) {
                issues.push({
                    path   : `changeRecords.${index}`,
                    message: `references unknown class ${id}`,
                    classId: id,
                });
            }
        }
    });
}

/**
 * Validate and decode a document.
 *
 * Every problem is collected; if there is at least one, nothing is returned.
 *
 * @param input - Parsed JSON (unknown shape)
 * @throws MalformedImportError listing every issue found
 */
export function decodeTaxonomy(input: unknown): DecodedTaxonomy {
    const parsed = TaxonomyDocumentSchema.safeParse(input);
    if (!parsed.success) {
        throw new MalformedImportError(issuesFromZod(parsed.error));
    }

    const doc = parsed.data;
    const issues: ImportIssue[] = [];

    const keys = Object.keys(doc.classes);
    const ordered = new Set(doc.classOrder);
    if (ordered.size !== doc.classOrder.length || ordered.size !== keys.length || keys.some((key) => !ordered.has(key))) {
        issues.push({ path: "classOrder", message: "must list every class id exactly once" });
    }

    const classes: DecodedClass[] = [];
    for (const key of doc.classOrder) {
        const classDoc = doc.classes[key];
        if (!classDoc) {
            continue;
        }

        checkParameterKeys(key, classDoc, issues);
        const definition = classFromDocument(key, classDoc, issues);
        if (definition) {
            classes.push({
                definition,
                supersedes  : classDoc.supersedes,
                supersededBy: classDoc.supersededBy,
            });
        }
    }

    if (issues.length === 0) {
        checkLinks(classes, doc.changeRecords, issues);
    }

    if (issues.length > 0) {
        throw new MalformedImportError(issues);
    }

    return {
        classes,
        changeRecords    : doc.changeRecords,
        history          : doc.history,
        classificationLog: doc.classificationLog,
    };
}

/**
 * Serialize a document as pretty-printed JSON.
 */
export function serializeTaxonomy(document: TaxonomyDocument): string {
    return `${JSON.stringify(document, null, 2)}\n`;
}

/**
 * Parse JSON text into an (unvalidated) document.
 *
 * @throws MalformedImportError when the text is not JSON
 */
export function parseTaxonomyJson(text: string): unknown {
    try {
        return JSON.parse(text) as unknown;
    }
    catch (error) {
        throw new MalformedImportError([{
            path   : "(root)",
            message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        }]);
    }
}

/**
 * Validate an untyped change set (e.g. read from a file).
 *
 * @throws InvalidChangeError naming the first offending path
 */
export function parseChangeSet(input: unknown, classId: string): ChangeSet {
    const parsed = ChangeSetSchema.safeParse(input);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const path = issue?.path.join(".") ?? "";
        throw new InvalidChangeError(
            classId,
            `invalid change set at ${path || "(root)"}: ${issue?.message ?? "unknown problem"}`,
            typeof issue?.path[1] === "string" ? issue.path[1] : undefined
        );
    }
    return parsed.data;
}
