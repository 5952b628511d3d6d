/**
 * @fileoverview Command barrel exports
 *
 * @module commands
 */

export {
    createCliLogger,
    formatError,
    parseNumberOption,
    parseWeights,
    type CommandContext,
    type GlobalOptions,
} from "./context.js";
export { defineClassCommand, printClassDetails, type DefineClassOptions } from "./defineClass.js";
export { classifyCommand, type ClassifyCommandOptions, type ClassifiedArtifact } from "./classify.js";
export { listClassesCommand, type ListClassesOptions } from "./listClasses.js";
export { modifyCommand, type ModifyOptions } from "./modify.js";
export { discoverCommand, type DiscoverCommandOptions } from "./discover.js";
export { historyCommand } from "./history.js";
export { statsCommand } from "./stats.js";
export { exportCommand, importCommand } from "./transfer.js";
export { archiveCommand, validateCommand, type ValidateOptions } from "./archive.js";
