import { InvalidBindingError } from "../errors";
import type { Callback, EventName } from "../types";
import type { Binding } from "./types";

const EMPTY: readonly never[] = Object.freeze([]);

/**
 * Event name → bindings multi-map with duplicate keys.
 *
 * Each event's list is copy-on-write: writers swap in a new frozen array, so an
 * array handed out by {@link snapshot} never changes afterwards. Dispatch can
 * iterate a snapshot while callbacks insert or remove bindings.
 */
export class BindingStore<TOwner = unknown> {
    private readonly entries: Map<EventName, readonly Binding<TOwner>[]> = new Map();
    private sequence = 0;

    /**
     * Append a binding. Never deduplicates.
     * @throws {InvalidBindingError} If the event name is not a string or the callback is not a function.
     */
    insert(event: EventName, owner: TOwner, callback: Callback<TOwner>, target?: string): Binding<TOwner> {
        if (typeof event !== "string") {
            throw new InvalidBindingError("event name must be a string");
        }
        if (typeof callback !== "function") {
            throw new InvalidBindingError(`callback for "${event}" must be a function`);
        }

        const binding: Binding<TOwner> = Object.freeze({
            id: ++this.sequence,
            event,
            owner,
            callback,
            target: target ?? (callback.name || "anonymous"),
        });
        this.replace(event, [...this.snapshot(event), binding]);
        return binding;
    }

    /** Remove one specific binding. Returns `false` if it was already gone. */
    remove(binding: Binding<TOwner>): boolean {
        const current = this.snapshot(binding.event);
        if (!current.includes(binding)) return false;
        this.replace(
            binding.event,
            current.filter((b) => b !== binding),
        );
        return true;
    }

    /** Remove every binding for the exact `(event, owner)` pair. */
    removeAll(event: EventName, owner: TOwner): number {
        const current = this.snapshot(event);
        const kept = current.filter((b) => !Object.is(b.owner, owner));
        this.replace(event, kept);
        return current.length - kept.length;
    }

    /** Remove every binding held by `owner`, across all events. */
    removeOwner(owner: TOwner): number {
        let removed = 0;
        for (const event of this.events()) {
            removed += this.removeAll(event, owner);
        }
        return removed;
    }

    /** Point-in-time, immutable view of the bindings for `event`. */
    snapshot(event: EventName): readonly Binding<TOwner>[] {
        return this.entries.get(event) ?? EMPTY;
    }

    /** Event names with at least one binding. */
    events(): EventName[] {
        return [...this.entries.keys()];
    }

    size(event?: EventName): number {
        if (event !== undefined) return this.snapshot(event).length;
        let total = 0;
        for (const list of this.entries.values()) {
            total += list.length;
        }
        return total;
    }

    /** Drop everything. Returns the number of bindings removed. */
    clear(): number {
        const total = this.size();
        this.entries.clear();
        return total;
    }

    private replace(event: EventName, next: Binding<TOwner>[]): void {
        if (next.length === 0) {
            this.entries.delete(event);
        } else {
            this.entries.set(event, Object.freeze(next));
        }
    }
}
