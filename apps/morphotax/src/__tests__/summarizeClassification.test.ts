/**
 * @fileoverview Unit tests for classification verdicts
 *
 * @module domain/__tests__/summarizeClassification
 */

import { describe, it, expect } from "vitest";
import { createFeatureMap, type ClassificationResult } from "@morphotax/engine";
import { summarizeClassification } from "../domain/verdicts/summarizeClassification.js";

function result(classId: string, confidence: number, isMember: boolean): ClassificationResult {
    return {
        classId,
        className   : `Class ${classId}`,
        isMember,
        confidence,
        gateFailures: [],
        diagnostic  : new Map(),
    };
}

const LUNATE = { feature: "tagliente_lunato", label: "lunate blade" };

describe("summarizeClassification", () => {
    // Scenario: Several member classes
    it("should report the top member as best", () => {
        const a = result("A", 0.9, true);
        const b = result("B", 0.8, true);

        const summary = summarizeClassification([a, b]);

        expect(summary.verdict).toBe("member");
        expect(summary.best).toBe(a);
        expect(summary.members).toEqual([a, b]);
    });

    // Scenario: A stricter class ranks first without accepting the artifact
    it("should prefer a lower-ranked member over a higher-confidence non-member", () => {
        const strict = result("STRICT", 0.95, false);
        const loose = result("LOOSE", 0.8, true);

        const summary = summarizeClassification([strict, loose]);

        expect(summary.verdict).toBe("member");
        expect(summary.best).toBe(loose);
    });

    // Scenario: Near miss
    it("should call a non-member possible from the near-miss confidence", () => {
        const near = result("A", 0.6, false);

        expect(summarizeClassification([near]).verdict).toBe("possible");
        expect(summarizeClassification([near], { nearMissConfidence: 0.7 })).toEqual({
            verdict          : "none",
            best             : near,
            members          : [],
            missingAdvisories: [],
        });
    });

    // Scenario: Empty taxonomy
    it("should return no best result without classes", () => {
        expect(summarizeClassification([])).toEqual({
            verdict          : "none",
            best             : null,
            members          : [],
            missingAdvisories: [],
        });
    });

    // Scenario: Advisory features never change the verdict
    it("should list advisory features the artifact lacks", () => {
        const member = result("A", 0.9, true);
        const advisoryFeatures = [LUNATE];

        const without = summarizeClassification([member], {
            advisoryFeatures,
            features: createFeatureMap({ tagliente_lunato: false }),
        });
        expect(without.verdict).toBe("member");
        expect(without.missingAdvisories).toEqual([LUNATE]);

        const numeric = summarizeClassification([member], {
            advisoryFeatures,
            features: createFeatureMap({ tagliente_lunato: 1 }),
        });
        expect(numeric.missingAdvisories).toEqual([LUNATE]);

        const present = summarizeClassification([member], {
            advisoryFeatures,
            features: createFeatureMap({ tagliente_lunato: true }),
        });
        expect(present.missingAdvisories).toEqual([]);
    });
});
