/**
 * archive / validate commands - Review archived classifications
 */

import chalk from "chalk";
import { ClassificationArchive, type ArchivedClassification } from "../adapters/sqlite/index.js";
import { parseNumberOption, type CommandContext } from "./context.js";

export interface ValidateOptions {
    notes?: string;
}

function withArchive<T>(ctx: CommandContext, fn: (archive: ClassificationArchive) => T): T {
    const archive = new ClassificationArchive(ctx.config.databasePath);
    try {
        return fn(archive);
    }
    finally {
        archive.close();
    }
}

function printRow(row: ArchivedClassification, ctx: CommandContext): void {
    const check = row.validated ? chalk.green("✓") : " ";
    const notes = row.validatorNotes ? chalk.dim(`  ${row.validatorNotes}`) : "";
    ctx.print(
        `${check} #${row.id}  ${row.artifactId}  ${row.verdict}  ${row.classId}  ` +
        `${row.confidence.toFixed(3)}  ${row.classifiedAt.toISOString()}${notes}`
    );
}

/**
 * List archived classifications of one artifact, or every validated one
 */
export function archiveCommand(artifactId: string | undefined, ctx: CommandContext): void {
    const rows = withArchive(ctx, (archive) =>
        artifactId === undefined ? archive.listValidated() : archive.listForArtifact(artifactId)
    );

    if (rows.length === 0) {
        ctx.print(chalk.dim(artifactId === undefined ? "No validated classifications." : `Nothing archived for ${artifactId}.`));
        return;
    }
    rows.forEach((row) => printRow(row, ctx));
}

/**
 * Confirm an archived classification
 */
export function validateCommand(id: string, options: ValidateOptions, ctx: CommandContext): void {
    const rowId = parseNumberOption("id", id);
    const found = withArchive(ctx, (archive) => archive.validate(rowId, options.notes ?? null));

    if (!found) {
        throw new Error(`No archived classification #${rowId}`);
    }
    ctx.print(chalk.green(`Validated #${rowId}`));
}
