/**
 * @fileoverview Taxonomy file workspace
 *
 * Owns one taxonomy document on disk. Every command loads the document into
 * a fresh registry, works on it and (for mutations) writes it back. Work is
 * serialized so that overlapping calls never save over each other, and the
 * file is replaced through a temporary sibling so a failed write leaves the
 * previous document intact.
 *
 * @module adapters/files/TaxonomyWorkspace
 */

import { existsSync, readFileSync, renameSync, writeFileSync } from "fs";
import {
    Mutex,
    TaxonomyRegistry,
    parseTaxonomyJson,
    serializeTaxonomy,
    silentLogger,
    type EngineLogger,
} from "@morphotax/engine";

export interface WorkspaceOptions {
    readonly logger?: EngineLogger;

    /** Clock handed to every registry (default: new Date()) */
    readonly now?: () => Date;
}

export class TaxonomyWorkspace {
    private readonly mutex = new Mutex();
    private readonly logger: EngineLogger;
    private readonly now: () => Date;

    constructor(
        public readonly path: string,
        options: WorkspaceOptions = {}
    ) {
        this.logger = options.logger ?? silentLogger;
        this.now = options.now ?? (() => new Date());
    }

    /**
     * True if the taxonomy file already exists.
     */
    exists(): boolean {
        return existsSync(this.path);
    }

    /**
     * Run a read-only operation against the stored taxonomy.
     */
    async read<T>(fn: (registry: TaxonomyRegistry) => T | Promise<T>): Promise<T> {
        return this.mutex.runExclusive(async () => fn(this.load()));
    }

    /**
     * Run an operation and save the taxonomy afterwards.
     *
     * Nothing is written if the operation throws.
     */
    async update<T>(fn: (registry: TaxonomyRegistry) => T | Promise<T>): Promise<T> {
        return this.mutex.runExclusive(async () => {
            const registry = this.load();
            const result = await fn(registry);
            this.save(registry);
            return result;
        });
    }

    private load(): TaxonomyRegistry {
        const registry = new TaxonomyRegistry({ logger: this.logger, now: this.now });

        if (!this.exists()) {
            this.logger.debug(`No taxonomy at ${this.path}, starting empty`);
            return registry;
        }

        registry.import(parseTaxonomyJson(readFileSync(this.path, "utf-8")), { recordHistory: false });
        return registry;
    }

    private save(registry: TaxonomyRegistry): void {
        const temporary = `${this.path}.tmp`;
        writeFileSync(temporary, serializeTaxonomy(registry.export()), "utf-8");
        renameSync(temporary, this.path);
        this.logger.debug(`Saved taxonomy to ${this.path}`, { classes: registry.size });
    }
}
