/**
 * classify command - Score artifacts against the taxonomy or a preset
 */

import chalk from "chalk";
import {
    TaxonomyRegistry,
    type ClassificationResult,
    type ClassDefinition,
    type ReferenceArtifact,
} from "@morphotax/engine";
import {
    DEFAULT_NEAR_MISS_CONFIDENCE,
    loadArtifacts,
    loadPreset,
    resolvePresetPath,
    type AdvisoryFeature,
} from "../config/index.js";
import { summarizeClassification, type ClassificationSummary, type Verdict } from "../domain/index.js";
import { ClassificationArchive } from "../adapters/sqlite/index.js";
import { OpenAIInterpreter } from "../interpreters/index.js";
import type { CommandContext } from "./context.js";

export interface ClassifyCommandOptions {
    /** Print every class, not only the verdict */
    all?: boolean;

    /** Classify against a preset instead of the stored taxonomy */
    preset?: string;

    /** Record each verdict in the SQLite archive */
    archive?: boolean;

    /** Ask OpenAI to explain each verdict */
    interpret?: boolean;
}

/**
 * One classified artifact.
 */
export interface ClassifiedArtifact {
    readonly label: string;
    readonly artifact: ReferenceArtifact;
    readonly results: ClassificationResult[];
    readonly summary: ClassificationSummary;
}

const VERDICT_COLOURS: Record<Verdict, (text: string) => string> = {
    member  : chalk.green,
    possible: chalk.yellow,
    none    : chalk.red,
};

function describeVerdict(summary: ClassificationSummary): string {
    const best = summary.best;
    if (!best) {
        return "no classes to compare against";
    }

    const subject = `${best.className} (${best.classId}) confidence ${best.confidence.toFixed(3)}`;
    switch (summary.verdict) {
        case "member":
            return `member of ${subject}`;
        case "possible":
            return `possible ${subject}`;
        default:
            return `no match, closest ${subject}`;
    }
}

function printResultDetails(result: ClassificationResult, rank: number, ctx: CommandContext): void {
    const status = result.isMember ? chalk.green("member") : chalk.dim("not a member");
    ctx.print(`  ${rank}. ${result.classId}  ${result.confidence.toFixed(3)}  ${status}`);

    for (const failure of result.gateFailures) {
        ctx.print(`       gate ${failure.feature}: expected ${failure.expected}, got ${failure.observed ?? "missing"}`);
    }
    for (const [name, diagnostic] of result.diagnostic) {
        if (diagnostic.status !== "match") {
            const [min, max] = diagnostic.expectedRange;
            ctx.print(`       ${name}: ${diagnostic.status} (${diagnostic.observed ?? "missing"}, expected ${min}-${max})`);
        }
    }
}

function classifyAll(
    registry: TaxonomyRegistry,
    artifacts: readonly ReferenceArtifact[],
    advisoryFeatures: readonly AdvisoryFeature[],
    nearMissConfidence: number
): ClassifiedArtifact[] {
    return artifacts.map((artifact, index) => {
        const results = registry.classify(artifact.features, {
            returnAllScores: true,
            artifactId     : artifact.id,
        });
        return {
            label  : artifact.id ?? `#${index + 1}`,
            artifact,
            results,
            summary: summarizeClassification(results, {
                nearMissConfidence,
                advisoryFeatures,
                features: artifact.features,
            }),
        };
    });
}

function archiveAll(
    classified: readonly ClassifiedArtifact[],
    classes: ReadonlyMap<string, ClassDefinition>,
    ctx: CommandContext
): void {
    const archive = new ClassificationArchive(ctx.config.databasePath);
    try {
        for (const { label, summary } of classified) {
            const best = summary.best;
            const definition = best ? classes.get(best.classId) : undefined;
            if (!best || !definition) {
                continue;
            }
            const row = archive.record({
                artifactId : label,
                result     : best,
                contentHash: definition.contentHash,
                verdict    : summary.verdict,
            });
            ctx.logger.debug("Archived classification", { id: row.id, artifactId: label });
        }
    }
    finally {
        archive.close();
    }
    ctx.print(chalk.dim(`Archived to ${ctx.config.databasePath}`));
}

/**
 * Classify every artifact of a feature file
 */
export async function classifyCommand(
    featuresFile: string,
    options: ClassifyCommandOptions,
    ctx: CommandContext
): Promise<ClassifiedArtifact[]> {
    const { artifacts, warnings } = loadArtifacts(featuresFile);
    warnings.forEach((warning) => ctx.logger.warn(warning));

    let classified: ClassifiedArtifact[];
    let classes: Map<string, ClassDefinition>;

    if (options.preset) {
        const preset = loadPreset(resolvePresetPath(options.preset));
        const registry = new TaxonomyRegistry({ logger: ctx.logger });
        preset.classes.forEach((definition) => registry.register(definition));

        ctx.print(chalk.dim(`Preset ${preset.name}: ${preset.classes.length} classes`));
        classified = classifyAll(registry, artifacts, preset.advisoryFeatures, preset.nearMissConfidence);
        classes = new Map(preset.classes.map((definition) => [definition.classId, definition]));
    }
    else {
        const classifyStored = (registry: TaxonomyRegistry) => ({
            classified: classifyAll(registry, artifacts, [], DEFAULT_NEAR_MISS_CONFIDENCE),
            classes   : new Map(registry.list().map((definition) => [definition.classId, definition])),
        });
        // The classification log is part of the taxonomy document; a missing
        // file stays missing.
        const outcome = ctx.workspace.exists()
            ? await ctx.workspace.update(classifyStored)
            : await ctx.workspace.read(classifyStored);
        classified = outcome.classified;
        classes = outcome.classes;
    }

    const interpreter = options.interpret ? createInterpreter(ctx) : null;

    for (const item of classified) {
        const colour = VERDICT_COLOURS[item.summary.verdict];
        ctx.print(`${chalk.bold(item.label)}: ${colour(describeVerdict(item.summary))}`);

        if (options.all) {
            item.results.forEach((result, index) => printResultDetails(result, index + 1, ctx));
        }

        if (item.summary.missingAdvisories.length > 0) {
            const labels = item.summary.missingAdvisories.map((advisory) => advisory.label).join(", ");
            ctx.print(chalk.yellow(`  Note: lacks ${labels}`));
        }

        if (interpreter) {
            const interpretation = await interpreter.interpret({
                artifactId: item.label,
                summary   : item.summary,
                results   : item.results,
            });
            ctx.print(`  ${interpretation.summary}`);
            interpretation.caveats.forEach((caveat) => ctx.print(chalk.dim(`  - ${caveat}`)));
        }
    }

    if (options.archive) {
        archiveAll(classified, classes, ctx);
    }

    return classified;
}

function createInterpreter(ctx: CommandContext): OpenAIInterpreter | null {
    if (!ctx.config.openai.apiKey) {
        ctx.print(chalk.yellow("Set OPENAI_API_KEY to use --interpret"));
        return null;
    }
    return new OpenAIInterpreter({
        apiKey: ctx.config.openai.apiKey,
        model : ctx.config.openai.model,
    });
}
