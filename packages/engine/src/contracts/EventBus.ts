/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for progress events emitted while a check is scaffolded.
 * The command line subscribes to them to report what was written.
 *
 * Design decisions:
 * - Synchronous dispatch (the scaffolder never suspends)
 * - In-memory implementation only
 * - Ordering is preserved within a single event type
 *
 * @module @tidy-scaffold/engine/contracts/EventBus
 */

/**
 * Event types emitted over a scaffolding run.
 */
export type ScaffoldEventType =
    | "scaffold:started"
    | "scaffold:skipped"
    | "scaffold:completed"
    | "scaffold:failed"
    | "artifact:planned"
    | "artifact:written";

/**
 * Event payload base interface.
 * All events carry a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: ScaffoldEventType;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Additional event-specific data */
    readonly data?: Readonly<Record<string, unknown>>;
}

/**
 * Event handler function signature.
 */
export type EventHandler = (event: EventPayload) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("artifact:written", (event) => {
 *     console.log("Wrote", event.data?.path);
 * });
 *
 * bus.emit(createEvent("artifact:written", { path: "misc/CMakeLists.txt" }));
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: ScaffoldEventType | "*", handler: EventHandler): Subscription;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: ScaffoldEventType,
    data?: Record<string, unknown>
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        ...(data && { data }),
    };
}
