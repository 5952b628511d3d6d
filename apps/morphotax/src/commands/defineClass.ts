/**
 * define-class command - Derive a class from reference artifacts
 */

import chalk from "chalk";
import type { ClassDefinition } from "@morphotax/engine";
import { loadArtifacts } from "../config/index.js";
import { parseNumberOption, parseWeights, type CommandContext } from "./context.js";

export interface DefineClassOptions {
    id?: string;
    description?: string;
    tolerance?: string;
    threshold?: string;
    weights?: string;
    operator?: string;
}

/**
 * Print the parameters and gates of a class.
 */
export function printClassDetails(definition: ClassDefinition, ctx: CommandContext): void {
    const namespaces = [
        ["Morphometric", definition.morphometricParams],
        ["Technological", definition.technologicalParams],
    ] as const;

    for (const [title, params] of namespaces) {
        if (params.size === 0) {
            continue;
        }
        ctx.print(chalk.white.bold(title));
        for (const param of params.values()) {
            ctx.print(
                `  ${param.name}: ${param.targetValue} ${param.unit} ` +
                `[${param.minThreshold}, ${param.maxThreshold}] ±${param.tolerance} (weight ${param.weight})`
            );
        }
    }

    if (definition.optionalFeatures.size > 0) {
        ctx.print(chalk.white.bold("Gates"));
        for (const [feature, required] of definition.optionalFeatures) {
            ctx.print(`  ${feature} = ${required}`);
        }
    }
}

/**
 * Derive a class from a reference file and store it
 */
export async function defineClassCommand(
    name: string,
    referenceFile: string,
    options: DefineClassOptions,
    ctx: CommandContext
): Promise<void> {
    const { artifacts, warnings } = loadArtifacts(referenceFile);
    warnings.forEach((warning) => ctx.logger.warn(warning));

    const toleranceFactor = options.tolerance === undefined
        ? ctx.config.toleranceFactor
        : parseNumberOption("--tolerance", options.tolerance);

    const definition = await ctx.workspace.update((registry) => registry.defineClass(name, artifacts, {
        classId            : options.id,
        description        : options.description,
        toleranceFactor,
        confidenceThreshold: options.threshold === undefined ? undefined : parseNumberOption("--threshold", options.threshold),
        weights            : options.weights === undefined ? undefined : parseWeights(options.weights),
        createdBy          : options.operator ?? ctx.config.operator,
    }));

    ctx.print(chalk.green(`Defined ${definition.classId} from ${artifacts.length} reference artifacts`));
    ctx.print(`  Hash:       ${definition.contentHash}`);
    ctx.print(`  Threshold:  ${definition.confidenceThreshold}`);
    printClassDetails(definition, ctx);
}
