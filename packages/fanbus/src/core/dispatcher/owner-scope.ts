import type { EventRef } from "../event/types";
import type { CallbackReference } from "../handler/types";
import type { OwnerScopeTarget } from "./types";

/**
 * Dispatcher (or broker) access bound to one owner token.
 *
 * - `subscribe(event, ref)` → `target.subscribe(event, owner, ref)`
 * - `unsubscribe(event)` → `target.unsubscribe(event, owner)`
 * - `release()` → drops every binding of the owner
 */
export class OwnerScope<TOwner = unknown> {
    constructor(
        private readonly target: OwnerScopeTarget<TOwner>,
        readonly owner: TOwner,
    ) {}

    subscribe<T>(event: EventRef<T>, ref: CallbackReference<TOwner, T>): () => void {
        return this.target.subscribe(event, this.owner, ref);
    }

    unsubscribe(event: EventRef<unknown>): void {
        this.target.unsubscribe(event, this.owner);
    }

    publish<T>(event: EventRef<T>, payload?: T): void {
        this.target.publish(event, payload);
    }

    /** Tie the owner's bindings to `signal`: they are released when it aborts. */
    watch(signal: AbortSignal): () => void {
        return this.target.watchOwner(this.owner, signal);
    }

    release(): number {
        return this.target.releaseOwner(this.owner);
    }
}
