/**
 * history command - Show the version history or the lineage of one class
 */

import chalk from "chalk";
import type { CommandContext } from "./context.js";

/**
 * Print the whole history, or the lineage and change records of a class
 */
export async function historyCommand(classId: string | undefined, ctx: CommandContext): Promise<void> {
    await ctx.workspace.read((registry) => {
        if (classId === undefined) {
            const entries = registry.history();
            if (entries.length === 0) {
                ctx.print(chalk.dim("No history yet."));
                return;
            }
            for (const entry of entries) {
                const from = entry.previousClassId ? ` from ${entry.previousClassId}` : "";
                ctx.print(`${entry.timestamp}  ${entry.action.padEnd(6)}  ${entry.classId}${from}`);
            }
            return;
        }

        const chain = registry.lineage(classId);
        ctx.print(chalk.white.bold(`Lineage of ${classId}`));
        chain.forEach((definition, index) => {
            ctx.print(`  ${index + 1}. ${definition.classId}  ${definition.contentHash.slice(0, 12)}  ${definition.createdAt.toISOString()}`);
        });

        const ids = new Set(chain.map((definition) => definition.classId));
        const records = registry.changeRecords().filter((record) => ids.has(record.toClassId));
        if (records.length > 0) {
            ctx.print(chalk.white.bold("Changes"));
            for (const record of records) {
                ctx.print(`  ${record.fromClassId} -> ${record.toClassId} by ${record.operator}: ${record.justification}`);
            }
        }
    });
}
