import type { Callback, EventName } from "../types";

export type BindingId = number;

/** One registered (event, owner, callback) triple. Immutable once stored. */
export interface Binding<TOwner = unknown> {
    readonly id: BindingId;
    readonly event: EventName;
    readonly owner: TOwner;
    readonly callback: Callback<TOwner>;
    /** Printable description of the callback, e.g. `"mailer.onUserCreated"`. */
    readonly target: string;
}
