/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process dispatch of scaffolding events.
 *
 * @module @tidy-scaffold/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    ScaffoldEventType,
    Subscription,
} from "../contracts/EventBus.js";

/**
 * In-memory EventBus implementation.
 *
 * - Handlers run synchronously, in subscription order
 * - "*" subscribes to every event
 * - A throwing handler is logged and does not stop the others
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("artifact:written", (event) => {
 *     console.log("Wrote", event.data?.path);
 * });
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<ScaffoldEventType | "*", Set<EventHandler>> = new Map();

    /**
     * Emit an event to its handlers, then to the wildcard handlers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: ScaffoldEventType | "*", handler: EventHandler): Subscription {
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

    /**
     * Get the number of handlers for a specific event type.
     * Useful for testing.
     */
    handlerCount(eventType: ScaffoldEventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        for (const handler of handlers) {
            try {
                handler(event);
            }
            catch (error) {
                // One handler failing must not keep the others from running
                console.error(`EventBus handler error for ${event.type}:`, error);
            }
        }
    }
}
