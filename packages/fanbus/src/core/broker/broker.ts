import { Dispatcher } from "../dispatcher/dispatcher";
import { OwnerScope } from "../dispatcher/owner-scope";
import type { BootstrapReport, StaticBinding } from "../dispatcher/types";
import type { EventRef } from "../event/types";
import { HandlerRegistry } from "../handler/registry";
import type { CallbackReference, HandlerDefinition } from "../handler/types";
import { createConsoleHandler } from "../logger/console-handler";
import { Logger } from "../logger/logger";
import { BrokerState } from "./enums";
import { BrokerLifecycle } from "./lifecycle";
import type { BrokerConfig, StartOptions } from "./types";

/** States in which the runtime API is usable. Dynamic subscriptions may precede `start()`. */
const LIVE_STATES = [BrokerState.CREATED, BrokerState.STARTING, BrokerState.READY];

export class Broker {
    readonly logger: Logger;
    readonly handlers: HandlerRegistry;
    private readonly dispatcher: Dispatcher;
    private readonly lifecycle: BrokerLifecycle;

    constructor(private readonly config: BrokerConfig = {}) {
        this.logger = new Logger(config.logger?.level ?? "info");
        if (config.logger?.console !== false) {
            this.logger.addHandler(createConsoleHandler());
        }
        for (const handler of config.logger?.handlers ?? []) {
            this.logger.addHandler(handler);
        }

        this.lifecycle = new BrokerLifecycle(this.logger);
        this.handlers = new HandlerRegistry(this.logger);
        this.dispatcher = new Dispatcher({ logger: this.logger, handlers: this.handlers, onError: config.onError });

        if (config.handlers) {
            this.handlers.register(config.handlers);
        }
    }

    get state(): BrokerState {
        return this.lifecycle.state;
    }

    register(handlers: HandlerDefinition | HandlerDefinition[]): void {
        this.lifecycle.require(BrokerState.CREATED);
        this.handlers.register(handlers);
    }

    /**
     * Bind the static subscriptions of the selected apps plus any explicit
     * bindings, then enter `ready`. The report lists the entries that failed.
     */
    start(options: StartOptions = {}): BootstrapReport {
        this.lifecycle.moveTo(BrokerState.STARTING);
        try {
            const apps = options.apps ?? this.config.apps;
            const owner = options.owner ?? this.config.owner;
            const discovered: StaticBinding[] = this.handlers
                .discover(apps)
                .map((sub) => ({ ...sub, owner: owner ?? sub.handler }));

            this.logger.info("Broker", "Start subscriptions", { apps: apps ?? "all", static: discovered.length });
            const report = this.dispatcher.bootstrap([...discovered, ...(options.bindings ?? [])]);
            this.lifecycle.moveTo(BrokerState.READY);
            return report;
        } catch (err) {
            this.lifecycle.moveTo(BrokerState.FAILED);
            throw err;
        }
    }

    shutdown(): void {
        this.lifecycle.require(BrokerState.READY);
        this.lifecycle.moveTo(BrokerState.STOPPING);
        const dropped = this.dispatcher.clear();
        this.logger.debug("Broker", `Dropped ${dropped} binding(s) on shutdown`);
        this.lifecycle.moveTo(BrokerState.STOPPED);
    }

    subscribe<T>(event: EventRef<T>, owner: unknown, ref: CallbackReference<unknown, T>): () => void {
        this.lifecycle.require(...LIVE_STATES);
        return this.dispatcher.subscribe(event, owner, ref);
    }

    unsubscribe(event: EventRef<unknown>, owner: unknown): void {
        this.lifecycle.require(...LIVE_STATES);
        this.dispatcher.unsubscribe(event, owner);
    }

    publish<T>(event: EventRef<T>, payload?: T): void {
        this.lifecycle.require(...LIVE_STATES);
        this.dispatcher.publish(event, payload);
    }

    /** Owner-bound access; each call goes through this broker's state checks. */
    forOwner(owner: unknown): OwnerScope {
        this.lifecycle.require(...LIVE_STATES);
        return new OwnerScope(this, owner);
    }

    releaseOwner(owner: unknown): number {
        this.lifecycle.require(...LIVE_STATES);
        return this.dispatcher.releaseOwner(owner);
    }

    watchOwner(owner: unknown, signal: AbortSignal): () => void {
        this.lifecycle.require(...LIVE_STATES);
        return this.dispatcher.watchOwner(owner, signal);
    }

    /** Number of bindings currently held for `event`. */
    subscriberCount(event: EventRef<unknown>): number {
        return this.dispatcher.bindings(event).length;
    }
}
