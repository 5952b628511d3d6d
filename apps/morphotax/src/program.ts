/**
 * @fileoverview Command-line program
 *
 * Wires every command into commander. The context factory is injectable so
 * the wiring can be exercised without touching the real environment.
 *
 * @module program
 */

import { Command } from "commander";
import chalk from "chalk";
import { loadConfig } from "./config/index.js";
import { TaxonomyWorkspace } from "./adapters/files/index.js";
import {
    archiveCommand,
    classifyCommand,
    createCliLogger,
    defineClassCommand,
    discoverCommand,
    exportCommand,
    historyCommand,
    importCommand,
    listClassesCommand,
    modifyCommand,
    statsCommand,
    validateCommand,
    type ClassifyCommandOptions,
    type CommandContext,
    type DefineClassOptions,
    type DiscoverCommandOptions,
    type GlobalOptions,
    type ListClassesOptions,
    type ModifyOptions,
    type ValidateOptions,
} from "./commands/index.js";

export type ContextFactory = (globals: GlobalOptions) => CommandContext;

/**
 * Build the context from the environment and global flags.
 */
export function createContext(globals: GlobalOptions): CommandContext {
    const config = loadConfig();
    const logger = createCliLogger(globals.verbose ?? false);
    const taxonomyPath = globals.taxonomy ?? config.taxonomyPath;

    return {
        config   : { ...config, taxonomyPath },
        workspace: new TaxonomyWorkspace(taxonomyPath, { logger }),
        logger,
        print    : (line = "") => console.log(line),
    };
}

/**
 * Create the morphotax program.
 */
export function createProgram(makeContext: ContextFactory = createContext): Command {
    const program = new Command();

    program
        .name("morphotax")
        .description("Parametric classification of measured artifacts into versioned classes")
        .version("1.0.0")
        .option("-t, --taxonomy <path>", "Taxonomy file (default: $MORPHOTAX_TAXONOMY or ./taxonomy.json)")
        .option("-v, --verbose", "Log engine activity")
        .configureOutput({
            writeErr: (str) => process.stderr.write(chalk.red(str)),
        });

    const context = (command: Command): CommandContext => makeContext(command.optsWithGlobals<GlobalOptions>());

    program
        .command("define-class")
        .description("Derive a class from reference artifacts")
        .argument("<name>", "Class name")
        .argument("<reference-file>", "JSON or YAML file of reference artifacts")
        .option("--id <class-id>", "Class id (default: TYPE_<NAME>)")
        .option("--description <text>", "Class description")
        .option("--tolerance <factor>", "Tolerance as a fraction of the target value")
        .option("--threshold <confidence>", "Membership threshold")
        .option("--weights <pairs>", "Feature weights, e.g. length=2,width=0.5")
        .option("--operator <name>", "Creator recorded on the class")
        .action((name: string, referenceFile: string, options: DefineClassOptions, command: Command) =>
            defineClassCommand(name, referenceFile, options, context(command))
        );

    program
        .command("classify")
        .description("Classify the artifacts of a feature file")
        .argument("<features-file>", "JSON or YAML file of artifacts")
        .option("-a, --all", "Show every class with its diagnostics")
        .option("-p, --preset <name-or-path>", "Classify against a preset (e.g. savignano)")
        .option("--archive", "Record verdicts in the classification archive")
        .option("--interpret", "Explain each verdict with OpenAI")
        .action(async (featuresFile: string, options: ClassifyCommandOptions, command: Command) => {
            await classifyCommand(featuresFile, options, context(command));
        });

    program
        .command("list-classes")
        .description("List the classes of the taxonomy")
        .option("-a, --all", "Include superseded versions")
        .option("-d, --details", "Show parameters and gates")
        .action((options: ListClassesOptions, command: Command) => listClassesCommand(options, context(command)));

    program
        .command("modify")
        .description("Create a new version of a class")
        .argument("<class-id>", "Class to modify")
        .argument("<changes-file>", "JSON or YAML change set")
        .requiredOption("-j, --justification <text>", "Why the class changes")
        .option("-o, --operator <name>", "Who makes the change (default: $MORPHOTAX_OPERATOR)")
        .action((classId: string, changesFile: string, options: ModifyOptions, command: Command) =>
            modifyCommand(classId, changesFile, options, context(command))
        );

    program
        .command("discover")
        .description("Promote clusters from an external clustering run to classes")
        .argument("<features-file>", "JSON or YAML file of artifacts with ids")
        .argument("<clusters-file>", "Cluster label per artifact id")
        .option("-m, --min-cluster-size <n>", "Smallest cluster promoted")
        .option("--noise-label <label>", "Label of unclustered artifacts (default: -1)")
        .action((featuresFile: string, clustersFile: string, options: DiscoverCommandOptions, command: Command) =>
            discoverCommand(featuresFile, clustersFile, options, context(command))
        );

    program
        .command("history")
        .description("Show the version history, or the lineage of one class")
        .argument("[class-id]", "Class whose lineage to show")
        .action((classId: string | undefined, _options: object, command: Command) =>
            historyCommand(classId, context(command))
        );

    program
        .command("stats")
        .description("Summarize the taxonomy")
        .action((_options: object, command: Command) => statsCommand(context(command)));

    program
        .command("export")
        .description("Write the taxonomy document to a file")
        .argument("<out>", "Output JSON file")
        .action((outFile: string, _options: object, command: Command) => exportCommand(outFile, context(command)));

    program
        .command("import")
        .description("Replace the taxonomy with a document")
        .argument("<in>", "Taxonomy JSON file")
        .action((inFile: string, _options: object, command: Command) => importCommand(inFile, context(command)));

    program
        .command("archive")
        .description("List archived classifications of an artifact, or every validated one")
        .argument("[artifact-id]", "Artifact to look up")
        .action((artifactId: string | undefined, _options: object, command: Command) =>
            archiveCommand(artifactId, context(command))
        );

    program
        .command("validate")
        .description("Confirm an archived classification")
        .argument("<id>", "Archive row id")
        .option("-n, --notes <text>", "Curator notes")
        .action((id: string, options: ValidateOptions, command: Command) => validateCommand(id, options, context(command)));

    return program;
}
