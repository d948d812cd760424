import { pascalCase } from "es-toolkit";
import { eventName } from "../event/helpers";
import type { Callback, EventName } from "../types";
import type { HandlerConfig, HandlerDefinition, StaticSubscription, SubscriptionDeclaration } from "./types";

/** Callback name a bare subscription resolves to: `"user_created"` → `"onUserCreated"`. */
export function defaultCallbackName(event: EventName): string {
    return `on${pascalCase(event)}`;
}

function normalize(handler: string, declaration: SubscriptionDeclaration): StaticSubscription {
    if (typeof declaration === "object" && "callback" in declaration) {
        return { event: eventName(declaration.event), handler, callback: declaration.callback };
    }
    const event = eventName(declaration);
    return { event, handler, callback: defaultCallbackName(event) };
}

/**
 * Declares a handler: a named set of callbacks that can be targeted by
 * `{ handler, callback }` references, plus its static subscriptions.
 *
 * @example
 * export const mailer = createHandler({
 *     id: "mailer",
 *     app: "accounts",
 *     callbacks: {
 *         onUserCreated(owner, payload) {},
 *         sendDigest(owner, payload) {},
 *     },
 *     subscriptions: ["user_created", { event: "digest_due", callback: "sendDigest" }],
 * });
 */
export function createHandler<TCallbacks extends Record<string, Callback>>(
    config: HandlerConfig<TCallbacks>,
): HandlerDefinition {
    if (!config.id) throw new Error("Handler must have an id");

    const callbacks: Record<string, Callback> = { ...config.callbacks };
    return Object.freeze({
        id: config.id,
        app: config.app ?? null,
        callbacks: Object.freeze(callbacks),
        subscriptions: Object.freeze((config.subscriptions ?? []).map((decl) => normalize(config.id, decl))),
    });
}
