/**
 * SQLite classification archive
 *
 * Keeps the outcome of every archived classification so that curators can
 * later confirm (validate) it. Each row pins the content hash of the class
 * the artifact was scored against, so a row stays meaningful after the
 * class has been superseded.
 */

import Database from "better-sqlite3";
import type { ClassificationResult } from "@morphotax/engine";
import type { Verdict } from "../../domain/verdicts/index.js";

/**
 * Raw row from the classifications table
 */
interface ClassificationRow {
    id: number;
    artifact_id: string;
    class_id: string;
    class_name: string;
    confidence: number;
    is_member: number;
    verdict: string;
    content_hash: string;
    classified_at: string;
    validated: number;
    validator_notes: string | null;
}

/**
 * Archived classification for external use
 */
export interface ArchivedClassification {
    id: number;
    artifactId: string;
    classId: string;
    className: string;
    confidence: number;
    isMember: boolean;
    verdict: Verdict;
    contentHash: string;
    classifiedAt: Date;
    validated: boolean;
    validatorNotes: string | null;
}

/**
 * What to archive for one artifact
 */
export interface ArchiveEntry {
    artifactId: string;

    /** The result reported to the curator (usually the best one) */
    result: ClassificationResult;

    /** Hash of the class the result refers to */
    contentHash: string;

    verdict: Verdict;

    /** Defaults to now */
    classifiedAt?: Date;
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS classifications (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        artifact_id TEXT NOT NULL,
        class_id TEXT NOT NULL,
        class_name TEXT NOT NULL,
        confidence REAL NOT NULL,
        is_member INTEGER NOT NULL,
        verdict TEXT NOT NULL,
        content_hash TEXT NOT NULL,
        classified_at TEXT NOT NULL,
        validated INTEGER NOT NULL DEFAULT 0,
        validator_notes TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_classifications_artifact ON classifications(artifact_id);
    CREATE INDEX IF NOT EXISTS idx_classifications_validated ON classifications(validated);
`;

const COLUMNS = `
    id, artifact_id, class_id, class_name, confidence, is_member, verdict,
    content_hash, classified_at, validated, validator_notes
`;

function toVerdict(value: string): Verdict {
    return value === "member" || value === "possible" ? value : "none";
}

function fromRow(row: ClassificationRow): ArchivedClassification {
    return {
        id            : row.id,
        artifactId    : row.artifact_id,
        classId       : row.class_id,
        className     : row.class_name,
        confidence    : row.confidence,
        isMember      : row.is_member === 1,
        verdict       : toVerdict(row.verdict),
        contentHash   : row.content_hash,
        classifiedAt  : new Date(row.classified_at),
        validated     : row.validated === 1,
        validatorNotes: row.validator_notes,
    };
}

/**
 * Classification archive backed by better-sqlite3
 */
export class ClassificationArchive {
    private db: Database.Database | null = null;
    private readonly dbPath: string;

    /**
     * @param dbPath - Database file, or ":memory:"
     */
    constructor(dbPath: string) {
        this.dbPath = dbPath;
    }

    /**
     * Open the database connection and create the schema if needed
     */
    open(): Database.Database {
        if (this.db) {
            return this.db;
        }

        const db = new Database(this.dbPath);
        db.pragma("journal_mode = WAL");
        db.exec(SCHEMA);
        this.db = db;
        return db;
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * Archive one classification
     */
    record(entry: ArchiveEntry): ArchivedClassification {
        const db = this.open();
        const classifiedAt = (entry.classifiedAt ?? new Date()).toISOString();

        const info = db.prepare(`
            INSERT INTO classifications
                (artifact_id, class_id, class_name, confidence, is_member, verdict, content_hash, classified_at)
            VALUES (?, ?, ?, ?, ?, ?, ?, ?)
        `).run(
            entry.artifactId,
            entry.result.classId,
            entry.result.className,
            entry.result.confidence,
            entry.result.isMember ? 1 : 0,
            entry.verdict,
            entry.contentHash,
            classifiedAt
        );

        const archived = this.get(Number(info.lastInsertRowid));
        if (!archived) {
            throw new Error(`Archived classification ${info.lastInsertRowid} could not be read back`);
        }
        return archived;
    }

    /**
     * Get one archived classification by row id
     */
    get(id: number): ArchivedClassification | null {
        const row = this.open()
            .prepare<[number], ClassificationRow>(`SELECT ${COLUMNS} FROM classifications WHERE id = ?`)
            .get(id);
        return row ? fromRow(row) : null;
    }

    /**
     * Every archived classification of an artifact, oldest first
     */
    listForArtifact(artifactId: string): ArchivedClassification[] {
        return this.open()
            .prepare<[string], ClassificationRow>(`SELECT ${COLUMNS} FROM classifications WHERE artifact_id = ? ORDER BY id`)
            .all(artifactId)
            .map(fromRow);
    }

    /**
     * Mark a classification as confirmed by a curator
     *
     * @returns false if no row has that id
     */
    validate(id: number, notes: string | null = null): boolean {
        const info = this.open()
            .prepare("UPDATE classifications SET validated = 1, validator_notes = ? WHERE id = ?")
            .run(notes, id);
        return info.changes > 0;
    }

    /**
     * Every validated classification, oldest first
     */
    listValidated(): ArchivedClassification[] {
        return this.open()
            .prepare<[], ClassificationRow>(`SELECT ${COLUMNS} FROM classifications WHERE validated = 1 ORDER BY id`)
            .all()
            .map(fromRow);
    }
}
