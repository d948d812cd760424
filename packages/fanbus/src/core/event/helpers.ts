import type { EventName } from "../types";
import type { EventDefinition, EventRef } from "./types";

/**
 * Creates a typed event definition.
 *
 * @example
 * const userCreated = createEvent<{ id: number }>("user_created");
 * broker.publish(userCreated, { id: 1 });
 */
export function createEvent<T = void>(name: EventName): EventDefinition<T> {
    if (!name || name.trim().length === 0) throw new Error("createEvent: name is required");
    return Object.freeze({ name });
}

export function eventName(event: EventRef<unknown>): EventName {
    return typeof event === "string" ? event : event.name;
}
