import type { EventName } from "../types";

/**
 * Typed event definition returned by {@link createEvent}.
 *
 * The payload type only exists at compile time; `publish` and `subscribe`
 * infer it from the definition they are given.
 */
export interface EventDefinition<T = unknown> {
    readonly name: EventName;
    /** @internal Phantom field carrying the payload type. Always `undefined`. */
    readonly __payload?: T;
}

/** Anything an operation accepts as an event: a plain name or a definition. */
export type EventRef<T = unknown> = EventName | EventDefinition<T>;
