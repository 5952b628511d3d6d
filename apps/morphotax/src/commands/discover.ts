/**
 * discover command - Promote external clusters to classes
 */

import chalk from "chalk";
import type { FeatureMap } from "@morphotax/engine";
import { loadArtifacts, loadClusters } from "../config/index.js";
import { parseNumberOption, type CommandContext } from "./context.js";

export interface DiscoverCommandOptions {
    minClusterSize?: string;
    noiseLabel?: string;
}

/**
 * Promote every large enough cluster of a clustering run
 */
export async function discoverCommand(
    featuresFile: string,
    clustersFile: string,
    options: DiscoverCommandOptions,
    ctx: CommandContext
): Promise<void> {
    const { artifacts, warnings } = loadArtifacts(featuresFile);
    warnings.forEach((warning) => ctx.logger.warn(warning));

    const featureMaps = new Map<string, FeatureMap>();
    artifacts.forEach((artifact, index) => {
        if (artifact.id === undefined) {
            ctx.logger.warn(`${featuresFile} #${index + 1}: artifact without id cannot be matched to a cluster`);
            return;
        }
        featureMaps.set(artifact.id, artifact.features);
    });

    const assignments = loadClusters(clustersFile);
    const minClusterSize = options.minClusterSize === undefined
        ? ctx.config.minClusterSize
        : parseNumberOption("--min-cluster-size", options.minClusterSize);

    const outcome = await ctx.workspace.update((registry) => registry.discover(featureMaps, assignments, {
        minClusterSize,
        noiseLabel: options.noiseLabel,
        build     : {
            toleranceFactor: ctx.config.toleranceFactor,
            createdBy      : ctx.config.operator ?? "discovery",
        },
    }));

    for (const definition of outcome.promoted) {
        ctx.print(chalk.green(`Promoted ${definition.classId} (${definition.validatedSamples.length} artifacts)`));
    }
    for (const cluster of outcome.rejected) {
        ctx.print(chalk.dim(`Skipped cluster ${cluster.label}: ${cluster.size} artifacts, need ${minClusterSize}`));
    }
    if (outcome.unassigned.length > 0) {
        ctx.print(chalk.yellow(`No cluster for: ${outcome.unassigned.join(", ")}`));
    }
    if (outcome.promoted.length === 0) {
        ctx.print(chalk.yellow("No clusters promoted."));
    }
}
