/**
 * list-classes command - Show the classes of the taxonomy
 */

import chalk from "chalk";
import type { CommandContext } from "./context.js";
import { printClassDetails } from "./defineClass.js";

export interface ListClassesOptions {
    /** Include superseded versions */
    all?: boolean;

    /** Print parameters and gates */
    details?: boolean;
}

/**
 * List current (or all) classes
 */
export async function listClassesCommand(options: ListClassesOptions, ctx: CommandContext): Promise<void> {
    await ctx.workspace.read((registry) => {
        const classes = options.all ? registry.list() : registry.currentVersions();

        if (classes.length === 0) {
            ctx.print(chalk.dim("No classes defined."));
            return;
        }

        for (const definition of classes) {
            const successor = registry.supersededBy(definition.classId);
            const marker = successor ? chalk.dim(` (superseded by ${successor})`) : "";
            ctx.print(`${chalk.cyan(definition.classId)}  ${definition.name}${marker}`);
            ctx.print(chalk.dim(`  threshold ${definition.confidenceThreshold}, ${definition.validatedSamples.length} samples, hash ${definition.contentHash.slice(0, 12)}`));

            if (options.details) {
                printClassDetails(definition, ctx);
            }
        }
    });
}
