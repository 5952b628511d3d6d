/**
 * @fileoverview Unit tests for ClassBuilder
 *
 * @module @morphotax/engine/__tests__/ClassBuilder
 */

import { describe, it, expect } from "vitest";
import {
    buildClassFromReferenceGroup,
    defaultClassId,
    defineFromReferenceGroup,
} from "../builder/ClassBuilder.js";
import { createFeatureMap, type ReferenceArtifact } from "../contracts/FeatureMap.js";
import { InsufficientSamplesError, InvalidParameterError } from "../errors/TaxonomyError.js";
import { classify } from "../scoring/Scorer.js";

const createdAt = new Date("2025-01-15T10:00:00.000Z");

function reference(id: string, record: Record<string, number | boolean>): ReferenceArtifact {
    return { id, features: createFeatureMap(record) };
}

describe("defaultClassId", () => {
    // Scenario: Name slug
    it("upper-cases the name and collapses separators", () => {
        expect(defaultClassId("Savignano type")).toBe("TYPE_SAVIGNANO_TYPE");
        expect(defaultClassId("  flanged / axe ")).toBe("TYPE_FLANGED_AXE");
        expect(defaultClassId("***")).toBe("TYPE_CLASS");
    });
});

describe("defineFromReferenceGroup", () => {
    // Scenario: Three flanged axes
    it("derives target, bounds and tolerance from the group", () => {
        const definition = defineFromReferenceGroup("Flanged axe", [
            reference("AXE_1", { len: 120, w: 65 }),
            reference("AXE_2", { len: 122, w: 65 }),
            reference("AXE_3", { len: 121, w: 65 }),
        ], { now: () => createdAt });

        const len = definition.morphometricParams.get("len");
        expect(len?.targetValue).toBe(121);
        expect(len?.minThreshold).toBe(120);
        expect(len?.maxThreshold).toBe(122);
        expect(len?.tolerance).toBeCloseTo(18.15, 10);

        expect(definition.morphometricParams.get("w")?.tolerance).toBeCloseTo(9.75, 10);
        expect(definition.classId).toBe("TYPE_FLANGED_AXE");
        expect(definition.description).toBe("Class defined from 3 reference objects");
        expect(definition.createdBy).toBe("system");
        expect(definition.createdAt.toISOString()).toBe("2025-01-15T10:00:00.000Z");
        expect(definition.validatedSamples).toEqual(["AXE_1", "AXE_2", "AXE_3"]);

        const result = classify(definition, createFeatureMap({ len: 121, w: 65 }));
        expect(result.confidence).toBe(1);
        expect(result.isMember).toBe(true);
    });

    // Scenario: Identical reference objects
    it("collapses identical objects to min = max = target", () => {
        const definition = defineFromReferenceGroup("Cast blank", [
            reference("B1", { length: 150, width: 40 }),
            reference("B2", { length: 150, width: 40 }),
            reference("B3", { length: 150, width: 40 }),
        ]);

        const length = definition.morphometricParams.get("length");
        expect(length?.minThreshold).toBe(150);
        expect(length?.maxThreshold).toBe(150);
        expect(length?.tolerance).toBeCloseTo(22.5, 10);
        expect(definition.morphometricParams.get("width")?.tolerance).toBeCloseTo(6, 10);

        const result = classify(definition, createFeatureMap({ length: 150, width: 40 }));
        expect(result.confidence).toBe(1);
        expect(result.isMember).toBe(true);
    });

    // Scenario: Too few references
    it("needs at least two reference objects", () => {
        expect(() => defineFromReferenceGroup("Lonely", [reference("L1", { length: 1 })]))
            .toThrow(InsufficientSamplesError);
        expect(() => defineFromReferenceGroup("Empty", [])).toThrow(InsufficientSamplesError);
    });

    // Scenario: Bad tolerance factor
    it("rejects a non-positive tolerance factor", () => {
        expect(() => defineFromReferenceGroup("Axe", [
            reference("A", { length: 1 }),
            reference("B", { length: 2 }),
        ], { toleranceFactor: 0 })).toThrow(InvalidParameterError);
    });

    // Scenario: Options override defaults
    it("applies weights, threshold, id, units and creator", () => {
        const definition = defineFromReferenceGroup("Axe", [
            reference("A", { length: 100, socket_depth: 20 }),
            reference("B", { length: 110, socket_depth: 22 }),
        ], {
            classId            : "AXE_CUSTOM",
            weights            : { length: 2 },
            confidenceThreshold: 0.6,
            toleranceFactor    : 0.1,
            units              : { socket_depth: "cm" },
            createdBy          : "curator",
        });

        expect(definition.classId).toBe("AXE_CUSTOM");
        expect(definition.confidenceThreshold).toBe(0.6);
        expect(definition.createdBy).toBe("curator");
        expect(definition.morphometricParams.get("length")?.weight).toBe(2);
        expect(definition.morphometricParams.get("length")?.tolerance).toBeCloseTo(10.5, 10);
        expect(definition.technologicalParams.get("socket_depth")?.unit).toBe("cm");
        expect(definition.technologicalParams.get("socket_depth")?.weight).toBe(1);
    });
});

describe("buildClassFromReferenceGroup", () => {
    // Scenario: Gates, dropped keys and namespaces
    it("turns constant booleans into gates and reports what it dropped", () => {
        const { definition, droppedKeys } = buildClassFromReferenceGroup("Socketed", [
            reference("S1", { length: 160, has_socket: true, has_loop: true, edge_angle: 40, decorated: true, mixed: 1 }),
            reference("S2", { length: 170, has_socket: true, has_loop: false, edge_angle: 44, mixed: true }),
        ]);

        expect(Array.from(definition.optionalFeatures)).toEqual([["has_socket", true]]);
        expect(Array.from(definition.morphometricParams.keys())).toEqual(["length"]);
        expect(Array.from(definition.technologicalParams.keys())).toEqual(["edge_angle"]);
        expect(droppedKeys).toEqual([
            { key: "has_loop", reason: "boolean-varies" },
            { key: "decorated", reason: "not-in-every-object" },
            { key: "mixed", reason: "mixed-kinds" },
        ]);
    });

    // Scenario: Zero-valued feature with no spread
    it("drops a zero-valued feature with no spread", () => {
        const { definition, droppedKeys } = buildClassFromReferenceGroup("Flat", [
            reference("F1", { offset: 0, length: 10 }),
            reference("F2", { offset: 0, length: 12 }),
        ]);

        expect(definition.morphometricParams.has("offset")).toBe(false);
        expect(droppedKeys).toEqual([{ key: "offset", reason: "no-spread" }]);
    });

    // Scenario: Zero target with spread uses the range
    it("uses the range for the tolerance when the target is zero", () => {
        const { definition } = buildClassFromReferenceGroup("Centered", [
            reference("C1", { offset: -2 }),
            reference("C2", { offset: 2 }),
        ]);

        expect(definition.morphometricParams.get("offset")?.targetValue).toBe(0);
        expect(definition.morphometricParams.get("offset")?.tolerance).toBeCloseTo(0.6, 10);
    });

    // Scenario: Missing ids fall back to positions
    it("names anonymous references by position", () => {
        const { definition } = buildClassFromReferenceGroup("Anonymous", [
            { features: createFeatureMap({ length: 1 }) },
            { features: createFeatureMap({ length: 2 }) },
        ]);

        expect(definition.validatedSamples).toEqual(["ref_0", "ref_1"]);
    });

    // Scenario: Reference group larger than the engine's argument limit
    it("derives bounds from a very large group", () => {
        const references = Array.from({ length: 200_000 }, (_, index) =>
            reference(`R${index}`, { length: 100 + (index % 50) })
        );

        const { definition } = buildClassFromReferenceGroup("Mass find", references);

        const length = definition.morphometricParams.get("length");
        expect(length?.minThreshold).toBe(100);
        expect(length?.maxThreshold).toBe(149);
        expect(length?.targetValue).toBe(124.5);
    });
});
