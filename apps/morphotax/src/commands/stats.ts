/**
 * stats command - Summarize the taxonomy
 */

import chalk from "chalk";
import type { CommandContext } from "./context.js";

/**
 * Print registry statistics
 */
export async function statsCommand(ctx: CommandContext): Promise<void> {
    const stats = await ctx.workspace.read((registry) => registry.statistics());

    ctx.print(chalk.cyan.bold("Taxonomy"));
    ctx.print(`  Classes:          ${stats.classCount} (${stats.currentClassCount} current)`);
    ctx.print(`  Classifications:  ${stats.totalClassifications}`);
    ctx.print(`  Modifications:    ${stats.totalModifications}`);

    for (const summary of stats.classes) {
        const status = summary.supersededBy ? chalk.dim(`superseded by ${summary.supersededBy}`) : chalk.green("current");
        ctx.print(
            `  ${summary.classId}: ${summary.parameterCount} parameters, ${summary.gateCount} gates, ` +
            `${summary.validatedSampleCount} samples, threshold ${summary.confidenceThreshold}, ${status}`
        );
    }
}
