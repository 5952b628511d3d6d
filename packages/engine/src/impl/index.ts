/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @morphotax/engine/impl
 */

export { InMemoryEventBus, type HandlerErrorReporter } from "./InMemoryEventBus.js";
