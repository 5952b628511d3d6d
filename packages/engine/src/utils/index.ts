/**
 * @fileoverview Utility barrel exports
 *
 * @module @morphotax/engine/utils
 */

export { Mutex } from "./Mutex.js";
