/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow of the enrichment engine. Subscribers observe the
 * lifecycle of the engine and of every entry passing through it.
 *
 * Dispatch is synchronous and in order of emission.
 *
 * @module @entrypipe/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID correlating all events of one entry */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Lifecycle event types emitted by the engine.
 */
export type LifecycleEventType =
    | "engine:starting"
    | "engine:started"
    | "engine:stopping"
    | "engine:stopped"
    | "engine:error";

/**
 * Processing event types emitted for each document.
 */
export type ProcessingEventType =
    | "entry:received"
    | "entry:enriched"
    | "entry:written"
    | "entry:sinkError"
    | "entry:processed"
    | "entry:error";

/**
 * All known event types. Custom types are allowed.
 */
export type EventType = LifecycleEventType | ProcessingEventType | string;

export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

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
 * const sub = bus.subscribe("entry:enriched", (event) => {
 *     console.log("Enriched:", event.data);
 * });
 *
 * bus.emit(createEvent("entry:enriched", { entryId: "1001" }, "tr_abc"));
 *
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler called when a matching event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe for a single event; the handler is removed after it runs.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for an event type, or all of them.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Create an event payload stamped with the current time.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        ...(traceId !== undefined && { traceId }),
        ...(data !== undefined && { data }),
    };
}
