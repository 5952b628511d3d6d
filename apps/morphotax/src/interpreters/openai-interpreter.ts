/**
 * OpenAI-based classification interpreter
 *
 * Turns a verdict and its ranked results into a short curator-facing
 * explanation. The numbers always come from the engine; the model only
 * words them.
 */

import OpenAI from "openai";
import { z } from "zod";
import type { ClassificationResult } from "@morphotax/engine";
import type { ClassificationSummary } from "../domain/verdicts/index.js";

/**
 * Interpretation returned to the CLI
 */
export interface Interpretation {
    summary: string;
    caveats: string[];
}

/**
 * What to interpret
 */
export interface InterpretationRequest {
    artifactId: string;

    summary: ClassificationSummary;

    /** Ranked results, best first */
    results: readonly ClassificationResult[];
}

/**
 * Configuration options for the OpenAI interpreter
 */
export interface OpenAIInterpreterConfig {
    /** OpenAI API key (defaults to OPENAI_API_KEY env var) */
    apiKey?: string;

    /** Model to use (default: gpt-4o-mini) */
    model?: string;

    /** Temperature for responses (default: 0.2) */
    temperature?: number;

    /** Maximum tokens for response */
    maxTokens?: number;

    /** Number of ranked results described in the prompt (default: 3) */
    topResults?: number;
}

const SYSTEM_PROMPT = `You assist archaeologists who classify artifacts by measured parameters.
You receive the outcome of a parametric classification. Explain it in plain language for a curator.

Respond with a JSON object containing:
- summary: two or three sentences on what the verdict means for this artifact
- caveats: a list of short strings naming measurements or features that weaken the result

Never change or invent numbers. Use only the values given.`;

const ResponseSchema = z.object({
    summary: z.string().min(1),
    caveats: z.array(z.string()).default([]),
});

function describeResult(result: ClassificationResult, rank: number): string {
    const lines = [
        `${rank}. ${result.className} (${result.classId}): confidence ${result.confidence.toFixed(3)}, ${result.isMember ? "member" : "not a member"}`,
    ];

    for (const failure of result.gateFailures) {
        lines.push(`   gate ${failure.feature}: expected ${failure.expected}, observed ${failure.observed ?? "missing"}`);
    }

    for (const [name, diagnostic] of result.diagnostic) {
        if (diagnostic.status === "match") {
            continue;
        }
        const [min, max] = diagnostic.expectedRange;
        const observed = diagnostic.observed ?? "missing";
        lines.push(`   ${name}: ${diagnostic.status}, observed ${observed}, expected ${min}-${max} (target ${diagnostic.target})`);
    }

    return lines.join("\n");
}

/**
 * Build the user prompt for a classification
 */
export function buildInterpretationPrompt(request: InterpretationRequest, topResults: number = 3): string {
    const { summary } = request;
    let prompt = `Artifact: ${request.artifactId}\nVerdict: ${summary.verdict}`;

    if (summary.best) {
        prompt += `\nBest class: ${summary.best.className} (${summary.best.classId})`;
    }

    const ranked = request.results.slice(0, topResults);
    if (ranked.length > 0) {
        prompt += `\n\nRanked results:\n${ranked.map((result, index) => describeResult(result, index + 1)).join("\n")}`;
    }

    if (summary.missingAdvisories.length > 0) {
        prompt += `\n\nExpected but absent features: ${summary.missingAdvisories.map((advisory) => advisory.label).join(", ")}`;
    }

    return prompt;
}

/**
 * OpenAI-based interpreter implementation
 */
export class OpenAIInterpreter {
    private client: OpenAI;
    private config: Required<Omit<OpenAIInterpreterConfig, "apiKey">>;

    constructor(config: OpenAIInterpreterConfig = {}) {
        this.client = new OpenAI({
            apiKey: config.apiKey ?? process.env.OPENAI_API_KEY,
        });

        this.config = {
            model      : config.model ?? "gpt-4o-mini",
            temperature: config.temperature ?? 0.2,
            maxTokens  : config.maxTokens ?? 400,
            topResults : config.topResults ?? 3,
        };
    }

    /**
     * Explain one classification. Never throws.
     */
    async interpret(request: InterpretationRequest): Promise<Interpretation> {
        try {
            const response = await this.client.chat.completions.create({
                model          : this.config.model,
                temperature    : this.config.temperature,
                max_tokens     : this.config.maxTokens,
                response_format: { type: "json_object" },
                messages       : [
                    { role: "system", content: SYSTEM_PROMPT },
                    { role: "user", content: buildInterpretationPrompt(request, this.config.topResults) },
                ],
            });

            const content = response.choices[0]?.message?.content;

            if (!content) {
                throw new Error("No response from OpenAI");
            }

            const parsed = ResponseSchema.safeParse(JSON.parse(content));
            if (!parsed.success) {
                throw new Error("Response is not { summary, caveats }");
            }

            return parsed.data;
        }
        catch (error) {
            return {
                summary: `Interpretation unavailable: ${error instanceof Error ? error.message : String(error)}`,
                caveats: [],
            };
        }
    }
}
