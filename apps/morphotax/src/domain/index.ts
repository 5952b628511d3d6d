/**
 * @fileoverview Domain barrel exports
 *
 * @module domain
 */

export * from "./verdicts/index.js";
