import type { CallbackInvocationError } from "../errors";
import type { HandlerRegistry } from "../handler/registry";
import type { EventRef } from "../event/types";
import type { CallbackReference, HandlerId } from "../handler/types";
import type { EventName, LoggerContext } from "../types";

export type DispatcherOptions = {
    /** Defaults to a silent logger. */
    logger?: LoggerContext;
    /** Table for late-bound `{ handler, callback }` references. Without it they all fail. */
    handlers?: HandlerRegistry;
    /** Called once per failed subscriber invocation, after the failure is logged. */
    onError?: (error: CallbackInvocationError) => void;
};

/** Input entry for {@link Dispatcher.bootstrap}. */
export type StaticBinding<TOwner = unknown> = {
    event: EventName;
    owner: TOwner;
    handler: HandlerId;
    callback: string;
};

export type BootstrapFailure<TOwner = unknown> = {
    binding: StaticBinding<TOwner>;
    error: Error;
};

export type BootstrapReport<TOwner = unknown> = {
    attempted: number;
    bound: number;
    failed: BootstrapFailure<TOwner>[];
};

/** Runtime surface an {@link OwnerScope} forwards to: a Dispatcher, or a Broker with its lifecycle guards. */
export interface OwnerScopeTarget<TOwner> {
    subscribe<T>(event: EventRef<T>, owner: TOwner, ref: CallbackReference<TOwner, T>): () => void;
    unsubscribe(event: EventRef<unknown>, owner: TOwner): void;
    publish<T>(event: EventRef<T>, payload?: T): void;
    releaseOwner(owner: TOwner): number;
    watchOwner(owner: TOwner, signal: AbortSignal): () => void;
}
