/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for the events a taxonomy registry publishes.
 * Subscribers observe registrations, new versions, imports and
 * classifications without the registry knowing who is listening.
 *
 * Design decisions:
 * - Synchronous dispatch (the registry itself is synchronous)
 * - In-memory implementation, no external queue
 * - Ordering is preserved within a single event type
 *
 * @module @morphotax/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Events emitted by a TaxonomyRegistry.
 */
export type RegistryEventType =
    | "class:registered"
    | "class:modified"
    | "class:unchanged"
    | "artifact:classified"
    | "taxonomy:discovered"
    | "taxonomy:imported";

/**
 * All known event types. Applications may publish their own.
 */
export type EventType = RegistryEventType | (string & {});

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("class:modified", (event) => {
 *     console.log("New version:", event.data?.toClassId);
 * });
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type (or "*" for all events).
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe and auto-unsubscribe after the first matching event.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a type, or every subscription.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @returns Event payload with timestamp
 */
export function createEvent(type: EventType, data?: Record<string, unknown>): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        data,
    };
}
