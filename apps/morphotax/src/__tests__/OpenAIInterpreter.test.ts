/**
 * @fileoverview Unit tests for the OpenAI interpreter
 *
 * Tests cover:
 * - Prompt construction from a verdict and its ranked results
 * - Response parsing
 * - Fallback on API and format errors
 *
 * @module interpreters/__tests__/OpenAIInterpreter
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ClassificationResult, ParameterDiagnostic } from "@morphotax/engine";

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

// Mock the OpenAI client
vi.mock("openai", () => ({
    default: vi.fn().mockImplementation(() => ({
        chat: { completions: { create: mockCreate } },
    })),
}));

import { OpenAIInterpreter, buildInterpretationPrompt, type InterpretationRequest } from "../interpreters/openai-interpreter.js";

const LENGTH_OUT_OF_RANGE: ParameterDiagnostic = {
    namespace    : "morphometric",
    observed     : 130,
    expectedRange: [120, 124],
    target       : 122,
    tolerance    : 18.3,
    weight       : 1,
    score        : 0,
    status       : "out-of-range",
};

const WIDTH_MATCH: ParameterDiagnostic = {
    namespace    : "morphometric",
    observed     : 65,
    expectedRange: [64, 66],
    target       : 65,
    tolerance    : 9.75,
    weight       : 1,
    score        : 1,
    status       : "match",
};

const FLANGED: ClassificationResult = {
    classId     : "TYPE_FLANGED_AXE",
    className   : "Flanged axe",
    isMember    : false,
    confidence  : 0.5,
    gateFailures: [],
    diagnostic  : new Map([["length", LENGTH_OUT_OF_RANGE], ["width", WIDTH_MATCH]]),
};

const SOCKETED: ClassificationResult = {
    classId     : "TYPE_SOCKETED_AXE",
    className   : "Socketed axe",
    isMember    : false,
    confidence  : 0,
    gateFailures: [{ feature: "socket", expected: true, observed: null }],
    diagnostic  : new Map(),
};

function createRequest(): InterpretationRequest {
    return {
        artifactId: "AXE_10",
        results   : [FLANGED, SOCKETED],
        summary   : {
            verdict          : "possible",
            best             : FLANGED,
            members          : [],
            missingAdvisories: [{ feature: "tagliente_lunato", label: "lunate blade" }],
        },
    };
}

function completion(content: string | null) {
    return { choices: [{ message: { content } }] };
}

describe("OpenAIInterpreter", () => {
    beforeEach(() => {
        mockCreate.mockReset();
    });

    describe("buildInterpretationPrompt", () => {
        // Scenario: Verdict, ranked results and advisories in the prompt
        it("should describe the verdict and every non-matching measurement", () => {
            expect(buildInterpretationPrompt(createRequest())).toBe([
                "Artifact: AXE_10",
                "Verdict: possible",
                "Best class: Flanged axe (TYPE_FLANGED_AXE)",
                "",
                "Ranked results:",
                "1. Flanged axe (TYPE_FLANGED_AXE): confidence 0.500, not a member",
                "   length: out-of-range, observed 130, expected 120-124 (target 122)",
                "2. Socketed axe (TYPE_SOCKETED_AXE): confidence 0.000, not a member",
                "   gate socket: expected true, observed missing",
                "",
                "Expected but absent features: lunate blade",
            ].join("\n"));
        });

        // Scenario: Only the top results are described
        it("should limit the ranked results", () => {
            const prompt = buildInterpretationPrompt(createRequest(), 1);

            expect(prompt).toContain("1. Flanged axe");
            expect(prompt).not.toContain("Socketed axe");
        });
    });

    describe("interpret", () => {
        // Scenario: Well-formed response
        it("should return the summary and caveats from the model", async () => {
            mockCreate.mockResolvedValue(completion(JSON.stringify({
                summary: "Close to the flanged axes but longer than any reference.",
                caveats: ["length outside the reference range"],
            })));

            const interpreter = new OpenAIInterpreter({ apiKey: "test-secret" });
            const interpretation = await interpreter.interpret(createRequest());

            expect(interpretation).toEqual({
                summary: "Close to the flanged axes but longer than any reference.",
                caveats: ["length outside the reference range"],
            });

            expect(mockCreate).toHaveBeenCalledTimes(1);
            const [request] = mockCreate.mock.calls[0] ?? [];
            expect(request).toMatchObject({
                model          : "gpt-4o-mini",
                temperature    : 0.2,
                response_format: { type: "json_object" },
            });
            expect(request.messages[1]).toEqual({ role: "user", content: buildInterpretationPrompt(createRequest()) });
        });

        // Scenario: Caveats are optional
        it("should default caveats to an empty list", async () => {
            mockCreate.mockResolvedValue(completion(JSON.stringify({ summary: "A flanged axe." })));

            const interpreter = new OpenAIInterpreter({ apiKey: "test-secret", model: "gpt-4o" });

            await expect(interpreter.interpret(createRequest())).resolves.toEqual({ summary: "A flanged axe.", caveats: [] });
            expect(mockCreate.mock.calls[0]?.[0]).toMatchObject({ model: "gpt-4o" });
        });

        // Scenario: API failure
        it("should fall back when the API call fails", async () => {
            mockCreate.mockRejectedValue(new Error("rate limited"));

            const interpreter = new OpenAIInterpreter({ apiKey: "test-secret" });

            await expect(interpreter.interpret(createRequest())).resolves.toEqual({
                summary: "Interpretation unavailable: rate limited",
                caveats: [],
            });
        });

        // Scenario: Empty or malformed content
        it("should fall back on empty or malformed responses", async () => {
            const interpreter = new OpenAIInterpreter({ apiKey: "test-secret" });

            mockCreate.mockResolvedValueOnce(completion(null));
            await expect(interpreter.interpret(createRequest())).resolves.toEqual({
                summary: "Interpretation unavailable: No response from OpenAI",
                caveats: [],
            });

            mockCreate.mockResolvedValueOnce(completion(JSON.stringify({ verdict: "member" })));
            await expect(interpreter.interpret(createRequest())).resolves.toEqual({
                summary: "Interpretation unavailable: Response is not { summary, caveats }",
                caveats: [],
            });
        });
    });
});
