/**
 * @fileoverview Unit tests for change application and version naming
 *
 * @module @morphotax/engine/__tests__/changes
 */

import { describe, it, expect } from "vitest";
import { createClassDefinition } from "../contracts/ClassDefinition.js";
import { InvalidChangeError } from "../errors/TaxonomyError.js";
import { applyChangeSet, baseClassId, nextVersionId, versionOf } from "../registry/changes.js";

const axe = createClassDefinition({
    classId            : "TYPE_AXE",
    name               : "Axe",
    description        : "Reference axes",
    morphometricParams : [
        { name: "length", targetValue: 125, minThreshold: 120, maxThreshold: 130, tolerance: 20 },
    ],
    technologicalParams: [
        { name: "edge_angle", targetValue: 40, minThreshold: 35, maxThreshold: 45, tolerance: 6 },
    ],
    optionalFeatures   : { has_socket: true },
    confidenceThreshold: 0.8,
    validatedSamples   : ["A1", "A2"],
    createdBy          : "system",
});

const candidateOptions = {
    classId  : "TYPE_AXE_v2",
    createdBy: "curator",
    createdAt: new Date("2025-02-01T09:00:00.000Z"),
};

describe("version naming", () => {
    // Scenario: Suffix parsing
    it("strips and reads the version suffix", () => {
        expect(baseClassId("TYPE_AXE_v3")).toBe("TYPE_AXE");
        expect(baseClassId("TYPE_AXE")).toBe("TYPE_AXE");
        expect(baseClassId("TYPE_v2_AXE")).toBe("TYPE_v2_AXE");
        expect(versionOf("TYPE_AXE_v12")).toBe(12);
        expect(versionOf("TYPE_AXE")).toBe(1);
    });

    // Scenario: Next free version across the lineage
    it("allocates one past the highest existing version of the base", () => {
        expect(nextVersionId("TYPE_AXE", ["TYPE_AXE"])).toBe("TYPE_AXE_v2");
        expect(nextVersionId("TYPE_AXE", ["TYPE_AXE", "TYPE_AXE_v2", "TYPE_AXE_v3"])).toBe("TYPE_AXE_v4");
        expect(nextVersionId("TYPE_AXE_v2", ["TYPE_AXE", "TYPE_AXE_v2", "TYPE_AXE_v3"])).toBe("TYPE_AXE_v4");
        expect(nextVersionId("TYPE_AXE", ["TYPE_AXE", "TYPE_AXE_LONG_v7"])).toBe("TYPE_AXE_v2");
    });
});

describe("applyChangeSet", () => {
    // Scenario: Edit a bound
    it("edits the named field and recomputes the hash", () => {
        const candidate = applyChangeSet(axe, { morphometric: { length: { maxThreshold: 135 } } }, candidateOptions);

        expect(candidate.classId).toBe("TYPE_AXE_v2");
        expect(candidate.morphometricParams.get("length")).toMatchObject({
            targetValue : 125,
            minThreshold: 120,
            maxThreshold: 135,
            tolerance   : 20,
        });
        expect(candidate.contentHash).not.toBe(axe.contentHash);
        expect(candidate.createdBy).toBe("curator");
        expect(candidate.createdAt.toISOString()).toBe("2025-02-01T09:00:00.000Z");
    });

    // Scenario: Identity carries over
    it("keeps name, description, threshold and samples", () => {
        const candidate = applyChangeSet(axe, { technological: { edge_angle: { weight: 2 } } }, candidateOptions);

        expect(candidate.name).toBe("Axe");
        expect(candidate.description).toBe("Reference axes");
        expect(candidate.confidenceThreshold).toBe(0.8);
        expect(candidate.validatedSamples).toEqual(["A1", "A2"]);
        expect(candidate.technologicalParams.get("edge_angle")?.weight).toBe(2);
    });

    // Scenario: Add and remove gates
    it("sets gates and removes them with null", () => {
        const candidate = applyChangeSet(axe, { gates: { has_socket: null, has_loop: false } }, candidateOptions);

        expect(Array.from(candidate.optionalFeatures)).toEqual([["has_loop", false]]);
    });

    // Scenario: Empty change set keeps the hash
    it("keeps the hash for an empty change set", () => {
        expect(applyChangeSet(axe, {}, candidateOptions).contentHash).toBe(axe.contentHash);
    });

    // Scenario: Unknown parameter name
    it("rejects an edit of a parameter that does not exist", () => {
        expect(() => applyChangeSet(axe, { morphometric: { width: { targetValue: 60 } } }, candidateOptions))
            .toThrow("Cannot modify TYPE_AXE: no morphometric parameter named \"width\"");
    });

    // Scenario: Namespace matters for lookups
    it("does not find a technological parameter in the morphometric namespace", () => {
        expect(() => applyChangeSet(axe, { morphometric: { edge_angle: { weight: 2 } } }, candidateOptions))
            .toThrow(InvalidChangeError);
    });

    // Scenario: Edit breaks an invariant
    it("wraps parameter invariant failures", () => {
        try {
            applyChangeSet(axe, { morphometric: { length: { minThreshold: 126 } } }, candidateOptions);
            expect.unreachable();
        }
        catch (error) {
            expect(error).toBeInstanceOf(InvalidChangeError);
            if (error instanceof InvalidChangeError) {
                expect(error.context.classId).toBe("TYPE_AXE");
                expect(error.context.parameter).toBe("length");
            }
        }
    });
});
