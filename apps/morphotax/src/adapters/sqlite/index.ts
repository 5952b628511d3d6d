/**
 * @fileoverview SQLite adapter exports
 *
 * @module adapters/sqlite
 */

export {
    ClassificationArchive,
    type ArchivedClassification,
    type ArchiveEntry,
} from "./ClassificationArchive.js";
