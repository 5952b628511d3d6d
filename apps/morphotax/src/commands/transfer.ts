/**
 * export / import commands - Move a taxonomy between files
 */

import { readFileSync, writeFileSync } from "fs";
import chalk from "chalk";
import { parseTaxonomyJson, serializeTaxonomy } from "@morphotax/engine";
import type { CommandContext } from "./context.js";

/**
 * Write the taxonomy document to a file
 */
export async function exportCommand(outFile: string, ctx: CommandContext): Promise<void> {
    const document = await ctx.workspace.read((registry) => registry.export());
    writeFileSync(outFile, serializeTaxonomy(document), "utf-8");
    ctx.print(chalk.green(`Exported ${Object.keys(document.classes).length} classes to ${outFile}`));
}

/**
 * Replace the taxonomy with a document. The stored taxonomy is untouched
 * if the document is rejected.
 */
export async function importCommand(inFile: string, ctx: CommandContext): Promise<void> {
    const document = parseTaxonomyJson(readFileSync(inFile, "utf-8"));
    const count = await ctx.workspace.update((registry) => {
        registry.import(document);
        return registry.size;
    });
    ctx.print(chalk.green(`Imported ${count} classes from ${inFile}`));
}
