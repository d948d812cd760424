import type { StaticBinding } from "../dispatcher/types";
import type { CallbackInvocationError } from "../errors";
import type { HandlerDefinition } from "../handler/types";
import type { LogHandler, LogLevel } from "../logger/types";

export type BrokerConfig = {
    handlers?: HandlerDefinition[];
    /** Apps whose handlers' static subscriptions are bound on start. Omit for all handlers. */
    apps?: string[];
    /** Owner token for discovered static subscriptions. Defaults to the handler id. */
    owner?: unknown;
    onError?: (error: CallbackInvocationError) => void;
    logger?: {
        /** Minimum level. Defaults to `"info"`. */
        level?: LogLevel;
        /** Install the console handler. Defaults to `true`. */
        console?: boolean;
        handlers?: LogHandler[];
    };
};

export type StartOptions = {
    /** Overrides `BrokerConfig.apps` for this start. */
    apps?: string[];
    /** Overrides `BrokerConfig.owner` for this start. */
    owner?: unknown;
    /** Extra static bindings produced by an external discovery pass. */
    bindings?: StaticBinding[];
};
