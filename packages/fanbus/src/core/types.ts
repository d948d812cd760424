export type EventName = string;

/**
 * Subscriber callback, invoked with the owner token it was bound under and the
 * published payload.
 *
 * Declared through a method signature so that callbacks typed for a specific
 * owner or payload can sit in the same binding list as untyped ones.
 */
export type Callback<TOwner = unknown, TPayload = unknown> = {
    bivarianceHack(owner: TOwner, payload: TPayload): void | Promise<void>;
}["bivarianceHack"];

// Logger contract
export interface LoggerContext {
    debug(code: string, message: string, details?: Record<string, unknown>): void;
    info(code: string, message: string, details?: Record<string, unknown>): void;
    warn(code: string, message: string, details?: Record<string, unknown>): void;
    error(code: string, message: string, details?: Record<string, unknown>): void;
}
