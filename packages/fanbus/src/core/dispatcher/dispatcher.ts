import { isPromise } from "es-toolkit";
import { BindingStore } from "../binding-store/binding-store";
import type { Binding } from "../binding-store/types";
import { CallbackInvocationError, InvalidBindingError, UnknownHandlerError, errorMessage } from "../errors";
import { eventName } from "../event/helpers";
import type { EventRef } from "../event/types";
import type { HandlerRegistry } from "../handler/registry";
import type { CallbackReference, LateBoundTarget } from "../handler/types";
import { Logger } from "../logger/logger";
import type { Callback, EventName, LoggerContext } from "../types";
import { OwnerScope } from "./owner-scope";
import type { BootstrapReport, DispatcherOptions, StaticBinding } from "./types";

const LOG_CODE = "Dispatcher";

/**
 * Subscribe / unsubscribe / publish surface over a {@link BindingStore}.
 *
 * `publish` invokes subscribers in-line, one after another, on a snapshot taken
 * before the first call. A failing subscriber is logged and reported through
 * `onError`; the remaining subscribers still run and `publish` returns normally.
 * Promises returned by callbacks are not awaited, only watched for rejection.
 */
export class Dispatcher<TOwner = unknown> {
    private readonly store: BindingStore<TOwner> = new BindingStore<TOwner>();
    private readonly logger: LoggerContext;
    private readonly handlers: HandlerRegistry | null;
    private readonly onError: ((error: CallbackInvocationError) => void) | null;

    constructor(options: DispatcherOptions = {}) {
        this.logger = options.logger ?? new Logger();
        this.handlers = options.handlers ?? null;
        this.onError = options.onError ?? null;
    }

    /**
     * Bind `owner` to `event` through `ref`. Duplicates are kept as independent bindings.
     *
     * @returns A function removing exactly this binding.
     * @throws {UnknownHandlerError} If a late-bound `ref` names an unregistered handler.
     * @throws {UnknownCallbackError} If the handler has no such callback.
     * @throws {InvalidBindingError} If the event name is empty or `ref` is neither a function nor a target.
     */
    subscribe<T>(event: EventRef<T>, owner: TOwner, ref: CallbackReference<TOwner, T>): () => void {
        const name = eventName(event);
        const { callback, target } = this.resolve(ref);
        const binding = this.store.insert(name, owner, callback, target);
        this.logger.debug(LOG_CODE, `Subscribed ${binding.target} to "${name}"`, { binding: binding.id });

        return () => {
            this.store.remove(binding);
        };
    }

    /** Remove every binding of `owner` for `event`. Unknown pairs are a no-op. */
    unsubscribe(event: EventRef<unknown>, owner: TOwner): void {
        const name = eventName(event);
        const removed = this.store.removeAll(name, owner);
        if (removed > 0) {
            this.logger.debug(LOG_CODE, `Unsubscribed ${removed} binding(s) from "${name}"`);
        }
    }

    publish<T>(event: EventRef<T>, payload?: T): void {
        const name = eventName(event);
        const snapshot = this.store.snapshot(name);
        this.safeLog("info", `Dispatch event "${name}"`, { subscribers: snapshot.length });

        for (const binding of snapshot) {
            this.invoke(binding, payload);
        }
    }

    /**
     * Subscribe every static binding through its `{ handler, callback }` target.
     * Failing entries are logged and collected; the rest are still attempted.
     */
    bootstrap(bindings: readonly StaticBinding<TOwner>[]): BootstrapReport<TOwner> {
        const report: BootstrapReport<TOwner> = { attempted: 0, bound: 0, failed: [] };

        for (const entry of bindings) {
            report.attempted++;
            try {
                this.subscribe(entry.event, entry.owner, { handler: entry.handler, callback: entry.callback });
                report.bound++;
            } catch (err) {
                const error = err instanceof Error ? err : new Error(String(err));
                report.failed.push({ binding: entry, error });
                this.logger.error(LOG_CODE, `Static subscription to "${entry.event}" skipped`, {
                    handler: entry.handler,
                    callback: entry.callback,
                    error: error.message,
                });
            }
        }

        this.logger.info(LOG_CODE, `Bootstrapped ${report.bound}/${report.attempted} static subscription(s)`);
        return report;
    }

    /** Drop every binding held by `owner`. Hook for owner teardown. */
    releaseOwner(owner: TOwner): number {
        const removed = this.store.removeOwner(owner);
        if (removed > 0) {
            this.logger.debug(LOG_CODE, `Released ${removed} binding(s) of a terminated owner`);
        }
        return removed;
    }

    /**
     * Release `owner` once `signal` aborts. An already aborted signal releases
     * immediately.
     *
     * @returns A function detaching the watcher without releasing.
     */
    watchOwner(owner: TOwner, signal: AbortSignal): () => void {
        if (signal.aborted) {
            this.releaseOwner(owner);
            return () => {};
        }
        const onAbort = () => {
            this.releaseOwner(owner);
        };
        signal.addEventListener("abort", onAbort, { once: true });
        return () => {
            signal.removeEventListener("abort", onAbort);
        };
    }

    forOwner(owner: TOwner): OwnerScope<TOwner> {
        return new OwnerScope(this, owner);
    }

    /** Current bindings for `event` (an immutable snapshot). */
    bindings(event: EventRef<unknown>): readonly Binding<TOwner>[] {
        return this.store.snapshot(eventName(event));
    }

    events(): EventName[] {
        return this.store.events();
    }

    /** Remove all bindings. Returns how many were dropped. */
    clear(): number {
        return this.store.clear();
    }

    private resolve(ref: CallbackReference<TOwner, unknown>): { callback: Callback<TOwner>; target: string } {
        if (typeof ref === "function") {
            return { callback: ref, target: ref.name || "anonymous" };
        }
        return this.resolveLateBound(ref);
    }

    private resolveLateBound(ref: LateBoundTarget): { callback: Callback<TOwner>; target: string } {
        // Targets may arrive as untyped configuration data.
        const valid =
            typeof ref === "object" && ref !== null && typeof ref.handler === "string" && typeof ref.callback === "string";
        if (!valid) {
            throw new InvalidBindingError("callback reference must be a function or a { handler, callback } target");
        }
        if (!this.handlers) {
            throw new UnknownHandlerError(ref.handler);
        }
        return this.handlers.resolve(ref);
    }

    private invoke(binding: Binding<TOwner>, payload: unknown): void {
        try {
            const result = binding.callback(binding.owner, payload);
            if (isPromise(result)) {
                result.catch((err: unknown) => {
                    this.report(binding, err);
                });
            }
        } catch (err) {
            this.report(binding, err);
        }
    }

    private report(binding: Binding<TOwner>, cause: unknown): void {
        const error = new CallbackInvocationError(binding.event, binding.target, cause);
        this.safeLog("error", error.message, {
            event: binding.event,
            target: binding.target,
            binding: binding.id,
        });

        if (!this.onError) return;
        try {
            this.onError(error);
        } catch (hookErr) {
            this.safeLog("error", "onError hook failed", { error: errorMessage(hookErr) });
        }
    }

    /** Logging on the fan-out path; a throwing log handler falls back to stderr. */
    private safeLog(level: "info" | "error", message: string, details: Record<string, unknown>): void {
        try {
            this.logger[level](LOG_CODE, message, details);
        } catch (sinkErr) {
            console.error(`[${LOG_CODE}] log handler failed: ${errorMessage(sinkErr)} (${message})`);
        }
    }
}
