/**
 * @fileoverview TaxonomyRegistry
 *
 * The owner of a taxonomy: an ordered set of immutable class definitions
 * linked into version chains, plus the audit trail of how they came to be.
 *
 * Lifecycle of a class:
 * 1. Defined from a reference group, discovered from a cluster, or registered directly
 * 2. Used to classify artifacts (every registered version keeps classifying)
 * 3. Modified: a new version with the next `_v<n>` suffix supersedes it
 *
 * All mutations are synchronous and run to completion, so two calls can
 * never interleave within one registry instance.
 *
 * @module @morphotax/engine/registry/TaxonomyRegistry
 */

import type { BuildOptions } from "../builder/ClassBuilder.js";
import { buildClassFromReferenceGroup, MIN_REFERENCE_OBJECTS } from "../builder/ClassBuilder.js";
import type { ClassDefinition } from "../contracts/ClassDefinition.js";
import { parameterCount } from "../contracts/ClassDefinition.js";
import type { ClassificationResult } from "../contracts/ClassificationResult.js";
import type { EventBus, RegistryEventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { FeatureMap, ReferenceArtifact } from "../contracts/FeatureMap.js";
import type {
    ChangeRecord,
    ChangeSet,
    ClassificationLogEntry,
    ClassSummary,
    HistoryEntry,
    TaxonomyStatistics,
} from "../contracts/History.js";
import type { EngineLogger } from "../contracts/Logger.js";
import { consoleLogger, scopedLogger } from "../contracts/Logger.js";
import {
    DuplicateClassIdError,
    InvalidChangeError,
    InvalidParameterError,
    UnknownClassIdError,
} from "../errors/TaxonomyError.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { classifyAll } from "../scoring/Scorer.js";
import type { DecodedClass, TaxonomyDocument } from "../serialization/TaxonomyDocument.js";
import { decodeTaxonomy, encodeTaxonomy, parseChangeSet } from "../serialization/TaxonomyDocument.js";
import { applyChangeSet, freezeChangeSet, nextVersionId } from "./changes.js";

/**
 * Options for {@link TaxonomyRegistry.import}.
 */
export interface ImportOptions {
    /**
     * Append an "import" history entry per class (default: true).
     * Off when reloading a registry's own saved state.
     */
    readonly recordHistory?: boolean;
}

/**
 * Registry configuration options.
 */
export interface RegistryConfig {
    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for registry operations */
    readonly logger?: EngineLogger;

    /** Clock used for timestamps (default: new Date()) */
    readonly now?: () => Date;
}

export interface ClassifyOptions {
    /** Return every class ranked instead of the best match only */
    readonly returnAllScores?: boolean;

    /** Id recorded in the classification log (default: "unknown") */
    readonly artifactId?: string;
}

export interface ModifyOutcome {
    /** False when the change left the content hash unchanged */
    readonly changed: boolean;

    /** The new version, or the existing class when nothing changed */
    readonly classDef: ClassDefinition;
}

export interface DiscoverOptions {
    /** Smallest cluster promoted to a class (default: 5, at least 2) */
    readonly minClusterSize?: number;

    /** Label of unclustered points (default: -1) */
    readonly noiseLabel?: string | number;

    /** Register promoted classes (default: true) */
    readonly register?: boolean;

    /** Passed to the builder for every promoted cluster */
    readonly build?: Omit<BuildOptions, "classId" | "now">;
}

export interface RejectedCluster {
    readonly label: string;
    readonly size: number;
}

export interface DiscoveryOutcome {
    readonly promoted: readonly ClassDefinition[];
    readonly rejected: readonly RejectedCluster[];

    /** Artifacts with no cluster assignment */
    readonly unassigned: readonly string[];
}

export const DEFAULT_MIN_CLUSTER_SIZE = 5;

export const DEFAULT_NOISE_LABEL = -1;

const UNKNOWN_ARTIFACT = "unknown";

interface RegistryEntry {
    readonly definition: ClassDefinition;
    supersedes: string | null;
    supersededBy: string | null;
}

function isBlank(value: string): boolean {
    return value.trim().length === 0;
}

/**
 * TaxonomyRegistry - versioned store of class definitions.
 *
 * @example
 * ```typescript
 * const registry = new TaxonomyRegistry();
 *
 * const axes = registry.defineClass("Flanged axe", references);
 * const best = registry.classify(features, { artifactId: "AXE_17" });
 *
 * const { classDef } = registry.modify(
 *     axes.classId,
 *     { morphometric: { length: { maxThreshold: 135 } } },
 *     "Longer blades found in the second hoard",
 *     "curator",
 * );
 * // classDef.classId === "TYPE_FLANGED_AXE_v2"
 * ```
 */
export class TaxonomyRegistry {
    private readonly logger: EngineLogger;
    private readonly now: () => Date;

    private entries: Map<string, RegistryEntry> = new Map();
    private records: ChangeRecord[] = [];
    private versionHistory: HistoryEntry[] = [];
    private log: ClassificationLogEntry[] = [];

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: RegistryConfig = {}) {
        this.eventBus = config.eventBus ?? new InMemoryEventBus();
        this.logger = scopedLogger(config.logger ?? consoleLogger, "registry");
        this.now = config.now ?? (() => new Date());
    }

    // =========================================================================
    // Class lifecycle
    // =========================================================================

    /**
     * Add a class as a new root of its own lineage.
     *
     * @throws DuplicateClassIdError if the id is taken
     */
    register(definition: ClassDefinition): ClassDefinition {
        this.insert(definition, null);

        this.versionHistory.push({
            action     : "create",
            classId    : definition.classId,
            contentHash: definition.contentHash,
            timestamp  : this.timestamp(),
            sampleCount: definition.validatedSamples.length,
        });

        this.logger.info("Class registered", {
            classId    : definition.classId,
            name       : definition.name,
            parameters : parameterCount(definition),
            gates      : definition.optionalFeatures.size,
            contentHash: definition.contentHash,
        });
        this.emit("class:registered", {
            classId    : definition.classId,
            name       : definition.name,
            contentHash: definition.contentHash,
        });

        return definition;
    }

    /**
     * Derive a class from a reference group and register it.
     *
     * @throws InsufficientSamplesError with fewer than two reference objects
     * @throws DuplicateClassIdError if the derived id is taken
     */
    defineClass(
        name: string,
        references: readonly ReferenceArtifact[],
        options: BuildOptions = {}
    ): ClassDefinition {
        const { definition, droppedKeys } = buildClassFromReferenceGroup(name, references, {
            now: this.now,
            ...options,
        });

        for (const dropped of droppedKeys) {
            this.logger.debug("Feature left out of class", {
                classId: definition.classId,
                key    : dropped.key,
                reason : dropped.reason,
            });
        }

        return this.register(definition);
    }

    get(classId: string): ClassDefinition | undefined {
        return this.entries.get(classId)?.definition;
    }

    has(classId: string): boolean {
        return this.entries.has(classId);
    }

    /**
     * Every registered class, in registration order.
     */
    list(): ClassDefinition[] {
        return Array.from(this.entries.values(), (entry) => entry.definition);
    }

    get size(): number {
        return this.entries.size;
    }

    /**
     * Classes that have not been superseded.
     */
    currentVersions(): ClassDefinition[] {
        return Array.from(this.entries.values())
            .filter((entry) => entry.supersededBy === null)
            .map((entry) => entry.definition);
    }

    supersedes(classId: string): string | null {
        return this.require(classId).supersedes;
    }

    supersededBy(classId: string): string | null {
        return this.require(classId).supersededBy;
    }

    // =========================================================================
    // Classification
    // =========================================================================

    /**
     * Score an artifact against every registered class.
     *
     * @returns The best result (null on an empty registry), or the full
     *          ranking when `returnAllScores` is set
     */
    classify(features: FeatureMap, options?: ClassifyOptions & { returnAllScores?: false }): ClassificationResult | null;
    classify(features: FeatureMap, options: ClassifyOptions & { returnAllScores: true }): ClassificationResult[];
    classify(features: FeatureMap, options: ClassifyOptions): ClassificationResult | ClassificationResult[] | null;
    classify(features: FeatureMap, options: ClassifyOptions = {}): ClassificationResult | ClassificationResult[] | null {
        const ranked = classifyAll(this.list(), features);
        const best = ranked.at(0) ?? null;
        const artifactId = options.artifactId ?? UNKNOWN_ARTIFACT;

        this.log.push({
            artifactId,
            bestMatch : best?.classId ?? null,
            confidence: best?.confidence ?? 0,
            isMember  : best?.isMember ?? false,
            timestamp : this.timestamp(),
        });

        this.emit("artifact:classified", {
            artifactId,
            bestMatch : best?.classId ?? null,
            confidence: best?.confidence ?? 0,
            isMember  : best?.isMember ?? false,
            classes   : ranked.length,
        });

        return options.returnAllScores ? ranked : best;
    }

    // =========================================================================
    // Modification
    // =========================================================================

    /**
     * Apply a change set, producing a new version unless nothing changed.
     *
     * The change set is validated and copied; the change record never shares
     * objects with the caller.
     *
     * @throws UnknownClassIdError if the class is not registered
     * @throws InvalidChangeError on a blank justification or operator, a
     *         field no edit has, an unknown parameter, or an edit that breaks
     *         a parameter
     */
    modify(classId: string, input: ChangeSet, justification: string, operator: string): ModifyOutcome {
        const existing = this.require(classId).definition;

        if (isBlank(justification)) {
            throw new InvalidChangeError(classId, "a justification is required");
        }
        if (isBlank(operator)) {
            throw new InvalidChangeError(classId, "an operator is required");
        }

        const changes = freezeChangeSet(parseChangeSet(input, classId));

        const createdAt = this.now();
        const candidate = applyChangeSet(existing, changes, {
            classId  : nextVersionId(classId, this.entries.keys()),
            createdBy: operator,
            createdAt,
        });

        if (candidate.contentHash === existing.contentHash) {
            this.logger.info("Modification left class unchanged", { classId, operator });
            this.emit("class:unchanged", { classId, contentHash: existing.contentHash });
            return { changed: false, classDef: existing };
        }

        this.insert(candidate, classId);
        const predecessor = this.require(classId);
        // A superseded version keeps pointing at its first successor.
        if (predecessor.supersededBy === null) {
            predecessor.supersededBy = candidate.classId;
        }

        const timestamp = createdAt.toISOString();
        this.records.push({
            fromClassId: classId,
            toClassId  : candidate.classId,
            fromHash   : existing.contentHash,
            toHash     : candidate.contentHash,
            justification,
            operator,
            timestamp,
            changes,
        });
        this.versionHistory.push({
            action         : "modify",
            classId        : candidate.classId,
            contentHash    : candidate.contentHash,
            timestamp,
            previousClassId: classId,
        });

        this.logger.info("Class modified", {
            fromClassId: classId,
            toClassId  : candidate.classId,
            operator,
            fromHash   : existing.contentHash,
            toHash     : candidate.contentHash,
        });
        this.emit("class:modified", {
            fromClassId: classId,
            toClassId  : candidate.classId,
            fromHash   : existing.contentHash,
            toHash     : candidate.contentHash,
            operator,
        });

        return { changed: true, classDef: candidate };
    }

    // =========================================================================
    // Discovery
    // =========================================================================

    /**
     * Promote clusters produced by an external clustering step to classes.
     *
     * @param featureMaps - Measurements per artifact id
     * @param assignments - Cluster label per artifact id
     * @throws InvalidParameterError if minClusterSize is below 2
     */
    discover(
        featureMaps: ReadonlyMap<string, FeatureMap>,
        assignments: ReadonlyMap<string, string | number>,
        options: DiscoverOptions = {}
    ): DiscoveryOutcome {
        const minClusterSize = options.minClusterSize ?? DEFAULT_MIN_CLUSTER_SIZE;
        if (!Number.isInteger(minClusterSize) || minClusterSize < MIN_REFERENCE_OBJECTS) {
            throw new InvalidParameterError(
                "minClusterSize",
                `must be an integer of at least ${MIN_REFERENCE_OBJECTS}, got ${minClusterSize}`
            );
        }

        const noiseLabel = String(options.noiseLabel ?? DEFAULT_NOISE_LABEL);
        const shouldRegister = options.register ?? true;

        const clusters = new Map<string, ReferenceArtifact[]>();
        const unassigned: string[] = [];

        for (const [artifactId, features] of featureMaps) {
            const assigned = assignments.get(artifactId);
            if (assigned === undefined) {
                unassigned.push(artifactId);
                continue;
            }

            const label = String(assigned);
            if (label === noiseLabel) {
                continue;
            }

            let members = clusters.get(label);
            if (!members) {
                members = [];
                clusters.set(label, members);
            }
            members.push({ id: artifactId, features });
        }

        const candidates: ClassDefinition[] = [];
        const rejected: RejectedCluster[] = [];

        for (const [label, members] of clusters) {
            if (members.length < minClusterSize) {
                rejected.push({ label, size: members.length });
                this.logger.debug("Cluster too small to promote", { label, size: members.length, minClusterSize });
                continue;
            }

            const name = `DiscoveredType_${label}`;
            const { definition, droppedKeys } = buildClassFromReferenceGroup(name, members, {
                ...options.build,
                classId    : name,
                description: options.build?.description ?? `Discovered from cluster ${label} (${members.length} artifacts)`,
                now        : this.now,
            });

            if (droppedKeys.length > 0) {
                this.logger.debug("Features left out of discovered class", {
                    classId: definition.classId,
                    keys   : droppedKeys.map((dropped) => dropped.key),
                });
            }

            candidates.push(definition);
        }

        // Nothing is registered unless every candidate id is free.
        if (shouldRegister) {
            const taken = candidates.find((definition) => this.entries.has(definition.classId));
            if (taken) {
                throw new DuplicateClassIdError(taken.classId);
            }
        }
        const promoted = shouldRegister
            ? candidates.map((definition) => this.register(definition))
            : candidates;

        this.logger.info("Discovery finished", {
            promoted  : promoted.length,
            rejected  : rejected.length,
            unassigned: unassigned.length,
            registered: shouldRegister,
        });
        this.emit("taxonomy:discovered", {
            promoted  : promoted.map((definition) => definition.classId),
            rejected  : rejected.length,
            unassigned: unassigned.length,
        });

        return { promoted, rejected, unassigned };
    }

    // =========================================================================
    // Audit trail
    // =========================================================================

    history(): HistoryEntry[] {
        return [...this.versionHistory];
    }

    changeRecords(): ChangeRecord[] {
        return [...this.records];
    }

    classificationLog(): ClassificationLogEntry[] {
        return [...this.log];
    }

    /**
     * Version chain ending at a class, oldest first.
     *
     * @throws UnknownClassIdError if the class is not registered
     */
    lineage(classId: string): ClassDefinition[] {
        const chain: ClassDefinition[] = [];
        let current: RegistryEntry | undefined = this.require(classId);

        while (current) {
            chain.unshift(current.definition);
            current = current.supersedes === null ? undefined : this.entries.get(current.supersedes);
        }

        return chain;
    }

    statistics(): TaxonomyStatistics {
        const classes: ClassSummary[] = Array.from(this.entries.values(), ({ definition, supersedes, supersededBy }) => ({
            classId             : definition.classId,
            name                : definition.name,
            contentHash         : definition.contentHash,
            validatedSampleCount: definition.validatedSamples.length,
            parameterCount      : parameterCount(definition),
            parameterCounts     : {
                morphometric : definition.morphometricParams.size,
                technological: definition.technologicalParams.size,
            },
            gateCount          : definition.optionalFeatures.size,
            confidenceThreshold: definition.confidenceThreshold,
            supersedes,
            supersededBy,
        }));

        return {
            classCount          : classes.length,
            currentClassCount   : classes.filter((summary) => summary.supersededBy === null).length,
            totalClassifications: this.log.length,
            totalModifications  : this.records.length,
            classes,
        };
    }

    // =========================================================================
    // Persistence
    // =========================================================================

    export(): TaxonomyDocument {
        return encodeTaxonomy({
            classes          : Array.from(this.entries.values(), (entry): DecodedClass => ({ ...entry })),
            changeRecords    : this.records,
            history          : this.versionHistory,
            classificationLog: this.log,
        }, this.now());
    }

    /**
     * Replace the registry's state with a document's.
     *
     * The document is validated in full before anything changes; on failure
     * the registry is left exactly as it was.
     *
     * @throws MalformedImportError listing every problem found
     */
    import(document: unknown, options: ImportOptions = {}): void {
        const decoded = decodeTaxonomy(document);

        const entries = new Map<string, RegistryEntry>();
        for (const entry of decoded.classes) {
            entries.set(entry.definition.classId, {
                definition  : entry.definition,
                supersedes  : entry.supersedes,
                supersededBy: entry.supersededBy,
            });
        }

        this.entries = entries;
        this.records = [...decoded.changeRecords];
        this.versionHistory = [...decoded.history];
        this.log = [...decoded.classificationLog];

        if (options.recordHistory ?? true) {
            const timestamp = this.timestamp();
            for (const { definition } of entries.values()) {
                this.versionHistory.push({
                    action     : "import",
                    classId    : definition.classId,
                    contentHash: definition.contentHash,
                    timestamp,
                });
            }
        }

        this.logger.info("Taxonomy imported", {
            classes      : entries.size,
            changeRecords: this.records.length,
        });
        this.emit("taxonomy:imported", {
            classes: Array.from(entries.keys()),
        });
    }

    // =========================================================================
    // Internals
    // =========================================================================

    private insert(definition: ClassDefinition, supersedes: string | null): void {
        if (this.entries.has(definition.classId)) {
            throw new DuplicateClassIdError(definition.classId);
        }
        this.entries.set(definition.classId, { definition, supersedes, supersededBy: null });
    }

    private require(classId: string): RegistryEntry {
        const entry = this.entries.get(classId);
        if (!entry) {
            throw new UnknownClassIdError(classId);
        }
        return entry;
    }

    private timestamp(): string {
        return this.now().toISOString();
    }

    private emit(type: RegistryEventType, data: Record<string, unknown>): void {
        this.eventBus.emit(createEvent(type, data));
    }
}
