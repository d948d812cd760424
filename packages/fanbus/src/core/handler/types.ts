import type { EventRef } from "../event/types";
import type { Callback, EventName } from "../types";

export type HandlerId = string;

/** Late-bound callback reference, resolved through a {@link HandlerRegistry} at subscribe time. */
export type LateBoundTarget = {
    handler: HandlerId;
    callback: string;
};

export type CallbackReference<TOwner = unknown, TPayload = unknown> = Callback<TOwner, TPayload> | LateBoundTarget;

/**
 * Static subscription as declared on a handler.
 *
 * A bare event uses the default callback name: `on` + the PascalCased event
 * (`"user_created"` → `"onUserCreated"`).
 */
export type SubscriptionDeclaration<TCallbackName extends string = string> =
    | EventRef
    | { event: EventRef; callback: TCallbackName };

export type HandlerConfig<TCallbacks extends Record<string, Callback>> = {
    id: HandlerId;
    /** Application the handler belongs to; discovery can be scoped by app. */
    app?: string;
    callbacks: TCallbacks;
    subscriptions?: SubscriptionDeclaration<NoInfer<keyof TCallbacks & string>>[];
};

/** One discovered `(event, handler, callback)` triple. */
export type StaticSubscription = {
    event: EventName;
    handler: HandlerId;
    callback: string;
};

/** Normalized handler returned by {@link createHandler}. */
export interface HandlerDefinition {
    readonly id: HandlerId;
    readonly app: string | null;
    readonly callbacks: Readonly<Record<string, Callback>>;
    readonly subscriptions: readonly StaticSubscription[];
}

export type ResolvedCallback = {
    callback: Callback;
    target: string;
};
