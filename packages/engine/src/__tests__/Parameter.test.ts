/**
 * @fileoverview Unit tests for Parameter scoring and FeatureMap conversion
 *
 * @module @morphotax/engine/__tests__/Parameter
 */

import { describe, it, expect } from "vitest";
import { createParameter, scoreParameter, isWithinBounds } from "../contracts/Parameter.js";
import {
    createFeatureMap,
    featureMapFromRecord,
    featureMapToRecord,
    getBoolean,
    getNumber,
} from "../contracts/FeatureMap.js";
import { InvalidParameterError } from "../errors/TaxonomyError.js";

const bladeWidth = createParameter({
    name        : "blade_width",
    targetValue : 100,
    minThreshold: 90,
    maxThreshold: 110,
    tolerance   : 50,
});

describe("createParameter", () => {
    // Scenario: Defaults for weight and unit
    it("applies weight 1 and unit mm by default", () => {
        expect(bladeWidth.weight).toBe(1);
        expect(bladeWidth.unit).toBe("mm");
        expect(Object.isFrozen(bladeWidth)).toBe(true);
    });

    // Scenario: Target outside the bounds
    it("rejects a target outside [min, max]", () => {
        expect(() => createParameter({
            name        : "length",
            targetValue : 130,
            minThreshold: 100,
            maxThreshold: 120,
            tolerance   : 10,
        }, "TYPE_A")).toThrow(InvalidParameterError);
    });

    // Scenario: Tolerance must be strictly positive
    it("rejects a zero tolerance", () => {
        expect(() => createParameter({
            name        : "length",
            targetValue : 110,
            minThreshold: 100,
            maxThreshold: 120,
            tolerance   : 0,
        })).toThrow("tolerance must be > 0, got 0");
    });

    // Scenario: Negative weights are not allowed
    it("rejects a negative weight", () => {
        expect(() => createParameter({
            name        : "length",
            targetValue : 110,
            minThreshold: 100,
            maxThreshold: 120,
            tolerance   : 5,
            weight      : -1,
        })).toThrow(InvalidParameterError);
    });

    // Scenario: Non-finite numbers
    it("rejects NaN bounds", () => {
        expect(() => createParameter({
            name        : "length",
            targetValue : 110,
            minThreshold: Number.NaN,
            maxThreshold: 120,
            tolerance   : 5,
        })).toThrow("minThreshold must be a finite number");
    });

    // Scenario: Error context names the parameter and class
    it("records the parameter and class in the error context", () => {
        try {
            createParameter({ name: "length", targetValue: 1, minThreshold: 2, maxThreshold: 3, tolerance: 1 }, "TYPE_A");
            expect.unreachable();
        }
        catch (error) {
            expect(error).toBeInstanceOf(InvalidParameterError);
            if (error instanceof InvalidParameterError) {
                expect(error.context.parameter).toBe("length");
                expect(error.context.classId).toBe("TYPE_A");
            }
        }
    });
});

describe("scoreParameter", () => {
    // Scenario: Exact target
    it("scores 1 at the target", () => {
        expect(scoreParameter(bladeWidth, 100)).toBe(1);
    });

    // Scenario: Linear decay inside the bounds
    it("decays linearly with the distance from the target", () => {
        expect(scoreParameter(bladeWidth, 110)).toBeCloseTo(0.8, 10);
        expect(scoreParameter(bladeWidth, 95)).toBeCloseTo(0.9, 10);
    });

    // Scenario: Hard bounds take precedence over tolerance
    it("scores 0 just outside the bounds even when the tolerance would allow more", () => {
        expect(scoreParameter(bladeWidth, 89)).toBe(0);
        expect(scoreParameter(bladeWidth, 111)).toBe(0);
        expect(isWithinBounds(bladeWidth, 90)).toBe(true);
    });

    // Scenario: Missing observation
    it("scores a missing value like one a full tolerance away", () => {
        const narrow = createParameter({
            name        : "length",
            targetValue : 100,
            minThreshold: 50,
            maxThreshold: 150,
            tolerance   : 10,
        });

        expect(scoreParameter(narrow, undefined)).toBe(0);
        expect(scoreParameter(narrow, 110)).toBe(0);
        expect(scoreParameter(narrow, 90)).toBe(0);
    });

    // Scenario: Distance beyond tolerance but inside bounds clips to 0
    it("clips at 0 inside wide bounds", () => {
        const wide = createParameter({
            name        : "length",
            targetValue : 100,
            minThreshold: 0,
            maxThreshold: 200,
            tolerance   : 10,
        });

        expect(scoreParameter(wide, 150)).toBe(0);
    });
});

describe("FeatureMap", () => {
    // Scenario: Plain records convert with unsupported values skipped
    it("keeps numbers and booleans and reports the rest", () => {
        const { features, skipped } = featureMapFromRecord(
            { id: "AXE_1", length: 120, has_socket: true, shape: "lunate", weight: null, depth: Number.POSITIVE_INFINITY },
            ["id"]
        );

        expect(getNumber(features, "length")).toBe(120);
        expect(getBoolean(features, "has_socket")).toBe(true);
        expect(skipped).toEqual(["shape", "weight", "depth"]);
        expect(features.size).toBe(2);
    });

    // Scenario: Kind mismatch reads as missing
    it("does not read a boolean as a number", () => {
        const features = createFeatureMap({ has_socket: true, length: 1 });

        expect(getNumber(features, "has_socket")).toBeUndefined();
        expect(getBoolean(features, "length")).toBeUndefined();
    });

    // Scenario: Back to a plain record
    it("converts back to a record", () => {
        expect(featureMapToRecord(createFeatureMap({ length: 120, has_socket: false }))).toEqual({
            length    : 120,
            has_socket: false,
        });
    });
});
