/**
 * @fileoverview Unit tests for the cluster assignment loader
 *
 * @module config/__tests__/loadClusters
 */

import { describe, it, expect } from "vitest";
import { clustersFromContent } from "../config/loadClusters.js";

describe("clustersFromContent", () => {
    // Scenario: Assignments under an "assignments" key
    it("should read wrapped assignments", () => {
        const clusters = clustersFromContent({ assignments: { AXE_1: 0, AXE_2: "west" } }, "clusters.yml");

        expect(Array.from(clusters)).toEqual([["AXE_1", 0], ["AXE_2", "west"]]);
    });

    // Scenario: Assignments at the top level
    it("should read a direct id-to-label record", () => {
        const clusters = clustersFromContent({ AXE_1: 1, AXE_2: -1 }, "clusters.json");

        expect(clusters.get("AXE_1")).toBe(1);
        expect(clusters.get("AXE_2")).toBe(-1);
    });

    // Scenario: Fractional labels and lists are rejected
    it("should reject labels that are not integers or strings", () => {
        expect(() => clustersFromContent({ AXE_1: 1.5 }, "clusters.json")).toThrow(
            "Invalid cluster file clusters.json: expected { <artifactId>: <label> } or { assignments: {...} }"
        );
        expect(() => clustersFromContent([0, 1], "clusters.json")).toThrow("Invalid cluster file clusters.json");
    });
});
