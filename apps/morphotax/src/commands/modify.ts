/**
 * modify command - Create a new version of a class from a change file
 */

import chalk from "chalk";
import { parseChangeSet } from "@morphotax/engine";
import { readStructuredFile } from "../config/index.js";
import type { CommandContext } from "./context.js";

export interface ModifyOptions {
    justification: string;
    operator?: string;
}

/**
 * Apply a change set (JSON or YAML) to a class
 */
export async function modifyCommand(
    classId: string,
    changesFile: string,
    options: ModifyOptions,
    ctx: CommandContext
): Promise<void> {
    const changes = parseChangeSet(readStructuredFile(changesFile), classId);
    const operator = options.operator ?? ctx.config.operator ?? "";

    const outcome = await ctx.workspace.update((registry) =>
        registry.modify(classId, changes, options.justification, operator)
    );

    if (!outcome.changed) {
        ctx.print(chalk.yellow(`No change: ${classId} already has these parameters`));
        return;
    }

    ctx.print(chalk.green(`Created ${outcome.classDef.classId} (supersedes ${classId})`));
    ctx.print(`  Hash:  ${outcome.classDef.contentHash}`);
}
