import { UnknownCallbackError, UnknownHandlerError } from "../errors";
import { Logger } from "../logger/logger";
import type { LoggerContext } from "../types";
import type { HandlerDefinition, HandlerId, LateBoundTarget, ResolvedCallback, StaticSubscription } from "./types";

/**
 * Name → handler table backing late-bound callback references and static
 * subscription discovery.
 */
export class HandlerRegistry {
    private readonly handlers = new Map<HandlerId, HandlerDefinition>();

    constructor(private readonly logger: LoggerContext = new Logger()) {}

    /**
     * Register one handler or a list of handlers.
     * A handler whose id is already taken is skipped with a warning.
     */
    register(handlers: HandlerDefinition | HandlerDefinition[]): void {
        const list = Array.isArray(handlers) ? handlers : [handlers];
        for (const handler of list) {
            if (this.handlers.has(handler.id)) {
                this.logger.warn("HandlerRegistry", `Handler "${handler.id}" is already registered. Skipping.`);
                continue;
            }
            this.handlers.set(handler.id, handler);
        }
    }

    unregister(id: HandlerId): boolean {
        return this.handlers.delete(id);
    }

    get(id: HandlerId): HandlerDefinition | undefined {
        return this.handlers.get(id);
    }

    has(id: HandlerId): boolean {
        return this.handlers.has(id);
    }

    list(): HandlerDefinition[] {
        return [...this.handlers.values()];
    }

    /**
     * Resolve a late-bound reference to the handler's callback function.
     * @throws {UnknownHandlerError} If no handler is registered under `target.handler`.
     * @throws {UnknownCallbackError} If the handler has no callback named `target.callback`.
     */
    resolve(target: LateBoundTarget): ResolvedCallback {
        const handler = this.handlers.get(target.handler);
        if (!handler) {
            throw new UnknownHandlerError(target.handler);
        }
        const callback = Object.hasOwn(handler.callbacks, target.callback)
            ? handler.callbacks[target.callback]
            : undefined;
        if (typeof callback !== "function") {
            throw new UnknownCallbackError(handler.id, target.callback);
        }
        return { callback, target: `${handler.id}.${target.callback}` };
    }

    /**
     * Static subscriptions of the handlers belonging to `apps`, in registration
     * and declaration order. Without `apps`, every registered handler is included.
     */
    discover(apps?: readonly string[]): StaticSubscription[] {
        const scope = apps ? new Set(apps) : null;
        return this.list()
            .filter((handler) => scope === null || (handler.app !== null && scope.has(handler.app)))
            .flatMap((handler) => handler.subscriptions);
    }
}
