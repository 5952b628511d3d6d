/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus for registry events.
 *
 * @module @morphotax/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * Called when a subscriber throws. Defaults to console.error.
 */
export type HandlerErrorReporter = (eventType: string, error: unknown) => void;

const reportToConsole: HandlerErrorReporter = (eventType, error) => {
    console.error(`EventBus handler error for ${eventType}:`, error);
};

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous dispatch, specific handlers before wildcard handlers
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 * - A throwing handler never prevents the others from running
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("class:registered", (event) => {
 *     console.log("Registered:", event.data?.classId);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly reportError: HandlerErrorReporter;

    constructor(reportError: HandlerErrorReporter = reportToConsole) {
        this.reportError = reportError;
    }

    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const wrappedHandler: EventHandler = (event) => {
            subscription.unsubscribe();
            handler(event);
        };

        const subscription = this.subscribe(eventType, wrappedHandler);
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers for an event type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe while we iterate.
        for (const handler of Array.from(handlers)) {
            try {
                handler(event);
            }
            catch (error) {
                this.reportError(event.type, error);
            }
        }
    }
}
