/**
 * @fileoverview File adapter exports
 *
 * @module adapters/files
 */

export { TaxonomyWorkspace, type WorkspaceOptions } from "./TaxonomyWorkspace.js";
