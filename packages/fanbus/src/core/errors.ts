import type { EventName } from "./types";

export type FanbusErrorCode =
    | "UNKNOWN_HANDLER"
    | "UNKNOWN_CALLBACK"
    | "INVALID_BINDING"
    | "CALLBACK_FAILED"
    | "ILLEGAL_STATE";

export class FanbusError extends Error {
    constructor(
        readonly code: FanbusErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A late-bound callback reference names a handler that is not registered. */
export class UnknownHandlerError extends FanbusError {
    constructor(readonly handler: string) {
        super("UNKNOWN_HANDLER", `Handler "${handler}" is not registered`);
    }
}

/** The handler exists but exposes no callback under the requested name. */
export class UnknownCallbackError extends FanbusError {
    constructor(
        readonly handler: string,
        readonly callback: string,
    ) {
        super("UNKNOWN_CALLBACK", `Handler "${handler}" has no callback "${callback}"`);
    }
}

export class InvalidBindingError extends FanbusError {
    constructor(reason: string) {
        super("INVALID_BINDING", `Invalid binding: ${reason}`);
    }
}

/** A subscriber threw, or its returned promise rejected, during publish. */
export class CallbackInvocationError extends FanbusError {
    constructor(
        readonly event: EventName,
        readonly target: string,
        cause: unknown,
    ) {
        super("CALLBACK_FAILED", `Subscriber ${target} failed on "${event}": ${errorMessage(cause)}`, { cause });
    }
}

export class LifecycleError extends FanbusError {
    constructor(message: string) {
        super("ILLEGAL_STATE", message);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
