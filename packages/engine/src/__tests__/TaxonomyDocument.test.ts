/**
 * @fileoverview Unit tests for the portable taxonomy document
 *
 * @module @morphotax/engine/__tests__/TaxonomyDocument
 */

import { describe, it, expect } from "vitest";
import { createClassDefinition } from "../contracts/ClassDefinition.js";
import { InvalidChangeError, MalformedImportError } from "../errors/TaxonomyError.js";
import {
    decodeTaxonomy,
    encodeTaxonomy,
    parseChangeSet,
    parseTaxonomyJson,
    serializeTaxonomy,
    type TaxonomyDocument,
} from "../serialization/TaxonomyDocument.js";

const createdAt = new Date("2025-01-15T10:00:00.000Z");

function twoVersionDocument(): TaxonomyDocument {
    const original = createClassDefinition({
        classId           : "TYPE_A",
        name              : "Type A",
        morphometricParams: [{ name: "length", targetValue: 10, minThreshold: 8, maxThreshold: 12, tolerance: 2 }],
        createdAt,
    });
    const successor = createClassDefinition({
        classId           : "TYPE_A_v2",
        name              : "Type A",
        morphometricParams: [{ name: "length", targetValue: 10, minThreshold: 8, maxThreshold: 14, tolerance: 2 }],
        createdAt,
        createdBy         : "curator",
    });

    return encodeTaxonomy({
        classes: [
            { definition: original, supersedes: null, supersededBy: "TYPE_A_v2" },
            { definition: successor, supersedes: "TYPE_A", supersededBy: null },
        ],
        changeRecords: [{
            fromClassId  : "TYPE_A",
            toClassId    : "TYPE_A_v2",
            fromHash     : original.contentHash,
            toHash       : successor.contentHash,
            justification: "Longer examples",
            operator     : "curator",
            timestamp    : createdAt.toISOString(),
            changes      : { morphometric: { length: { maxThreshold: 14 } } },
        }],
        history          : [],
        classificationLog: [],
    }, createdAt);
}

function clone(document: TaxonomyDocument): TaxonomyDocument {
    return JSON.parse(JSON.stringify(document));
}

function issuesOf(run: () => unknown): readonly string[] {
    try {
        run();
    }
    catch (error) {
        if (error instanceof MalformedImportError) {
            return error.issues.map((issue) => issue.path);
        }
        throw error;
    }
    return [];
}

describe("decodeTaxonomy", () => {
    // Scenario: A valid document decodes
    it("decodes classes with their links", () => {
        const decoded = decodeTaxonomy(clone(twoVersionDocument()));

        expect(decoded.classes.map((entry) => [entry.definition.classId, entry.supersedes, entry.supersededBy])).toEqual([
            ["TYPE_A", null, "TYPE_A_v2"],
            ["TYPE_A_v2", "TYPE_A", null],
        ]);
        expect(decoded.classes[1]?.definition.createdBy).toBe("curator");
        expect(decoded.changeRecords).toHaveLength(1);
    });

    // Scenario: Optional sections default
    it("accepts a document without history sections", () => {
        const document = clone(twoVersionDocument());
        const { changeRecords: _records, history: _history, classificationLog: _log, ...rest } = document;
        const bare = { ...rest, classes: { TYPE_B: { ...document.classes.TYPE_A, classId: "TYPE_B", supersededBy: null } }, classOrder: ["TYPE_B"] };

        expect(decodeTaxonomy(bare).classes).toHaveLength(1);
    });

    // Scenario: Wrong format version
    it("rejects another format version", () => {
        const document = { ...clone(twoVersionDocument()), formatVersion: 2 };

        expect(issuesOf(() => decodeTaxonomy(document))).toEqual(["formatVersion"]);
    });

    // Scenario: Class order must match the classes
    it("rejects a class order that skips a class", () => {
        const document = { ...clone(twoVersionDocument()), classOrder: ["TYPE_A"] };

        expect(issuesOf(() => decodeTaxonomy(document))).toContain("classOrder");
    });

    // Scenario: Key and id disagree
    it("rejects a class stored under another key", () => {
        const document = clone(twoVersionDocument());
        const classes = { ...document.classes, TYPE_A: { ...document.classes.TYPE_A, classId: "TYPE_Z" } };

        expect(issuesOf(() => decodeTaxonomy({ ...document, classes }))).toContain("classes.TYPE_A.classId");
    });

    // Scenario: Parameter invariant broken in the file
    it("rejects a parameter whose target lies outside its bounds", () => {
        const document = clone(twoVersionDocument());
        const classA = document.classes.TYPE_A;
        const length = classA?.morphometricParams.length;
        if (!classA || !length) {
            throw new Error("fixture is missing TYPE_A.length");
        }
        const broken = {
            ...document,
            classes: {
                ...document.classes,
                TYPE_A: { ...classA, morphometricParams: { length: { ...length, targetValue: 20 } } },
            },
        };

        try {
            decodeTaxonomy(broken);
            expect.unreachable();
        }
        catch (error) {
            expect(error).toBeInstanceOf(MalformedImportError);
            if (error instanceof MalformedImportError) {
                expect(error.issues[0]).toMatchObject({ classId: "TYPE_A", parameter: "length" });
            }
        }
    });

    // Scenario: Dangling supersession link
    it("rejects a successor that does not point back", () => {
        const document = clone(twoVersionDocument());
        const classes = {
            ...document.classes,
            TYPE_A_v2: { ...document.classes.TYPE_A_v2, supersedes: null },
        };

        expect(issuesOf(() => decodeTaxonomy({ ...document, classes }))).toEqual(["classes.TYPE_A.supersededBy"]);
    });

    // Scenario: Change record names an unknown class
    it("rejects a change record for an unknown class", () => {
        const document = clone(twoVersionDocument());
        const first = document.changeRecords[0];
        if (!first) {
            throw new Error("fixture has no change record");
        }

        expect(issuesOf(() => decodeTaxonomy({ ...document, changeRecords: [{ ...first, toClassId: "TYPE_Q" }] })))
            .toEqual(["changeRecords.0"]);
    });

    // Scenario: Not a document at all
    it("rejects non-objects", () => {
        expect(() => decodeTaxonomy(null)).toThrow(MalformedImportError);
        expect(() => decodeTaxonomy([1, 2])).toThrow(MalformedImportError);
    });
});

describe("JSON text", () => {
    // Scenario: Serialize then parse
    it("serializes with a trailing newline and parses back", () => {
        const document = twoVersionDocument();
        const text = serializeTaxonomy(document);

        expect(text.endsWith("}\n")).toBe(true);
        expect(decodeTaxonomy(parseTaxonomyJson(text)).classes).toHaveLength(2);
    });

    // Scenario: Invalid JSON
    it("reports invalid JSON as a malformed document", () => {
        expect(() => parseTaxonomyJson("{ not json")).toThrow(MalformedImportError);
    });
});

describe("parseChangeSet", () => {
    // Scenario: A valid change set
    it("accepts edits and gate removals", () => {
        expect(parseChangeSet({ morphometric: { length: { maxThreshold: 135 } }, gates: { has_socket: null } }, "TYPE_A"))
            .toEqual({ morphometric: { length: { maxThreshold: 135 } }, gates: { has_socket: null } });
    });

    // Scenario: Unknown field in an edit
    it("rejects fields that are not editable", () => {
        expect(() => parseChangeSet({ morphometric: { length: { name: "len" } } }, "TYPE_A")).toThrow(InvalidChangeError);
        expect(() => parseChangeSet({ confidenceThreshold: 0.5 }, "TYPE_A")).toThrow(InvalidChangeError);
    });

    // Scenario: Wrong value type
    it("names the offending parameter", () => {
        try {
            parseChangeSet({ technological: { edge_angle: { weight: "heavy" } } }, "TYPE_A");
            expect.unreachable();
        }
        catch (error) {
            expect(error).toBeInstanceOf(InvalidChangeError);
            if (error instanceof InvalidChangeError) {
                expect(error.context.parameter).toBe("edge_angle");
            }
        }
    });
});
