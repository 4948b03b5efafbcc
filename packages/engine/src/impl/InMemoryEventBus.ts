/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * A synchronous, in-memory event bus. A failing handler is logged and
 * never stops delivery to the remaining handlers.
 *
 * @module @entrypipe/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { PluginLogger } from "../contracts/PluginLogger.js";
import { describeError } from "../errors.js";
import { consoleLogger } from "./consoleLogger.js";

/**
 * Options for the in-memory bus.
 */
export interface InMemoryEventBusOptions {
    /** Receives handler failures (default: console) */
    readonly logger?: PluginLogger;
}

/**
 * In-memory EventBus implementation.
 *
 * - Synchronous dispatch; promises returned by handlers are not awaited,
 *   their rejections are logged
 * - Wildcard subscription ("*" for all events)
 * - One-time subscriptions via once()
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus({ logger });
 *
 * bus.subscribe("entry:processed", (event) => {
 *     console.log("Processed:", event.data);
 * });
 *
 * bus.emit(createEvent("entry:processed", { entryId: "1001" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: PluginLogger;

    constructor(options: InMemoryEventBusOptions = {}) {
        this.logger = options.logger ?? consoleLogger;
    }

    /**
     * Emit an event to its specific handlers, then to wildcard handlers.
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event, false);
        this.dispatch(this.handlers.get("*"), event, true);
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
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            return handler(event);
        });
        return subscription;
    }

    /**
     * Remove subscriptions for one event type; "*" or no argument clears
     * everything.
     */
    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers subscribed to an event type.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload, wildcard: boolean): void {
        if (!handlers) {
            return;
        }

        // Copy: once() handlers unsubscribe while we iterate.
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.reportFailure(event, wildcard, error));
                }
            }
            catch (error) {
                this.reportFailure(event, wildcard, error);
            }
        }
    }

    private reportFailure(event: EventPayload, wildcard: boolean, error: unknown): void {
        this.logger.error("EventBus handler error", {
            eventType: event.type,
            wildcard,
            error    : describeError(error),
        });
    }
}
