// ── Broker (lifecycle) ──────────────────────────────────────────────
export { Broker } from "./core/broker/broker";
export { BrokerState } from "./core/broker/enums";
export { createBroker } from "./core/broker/helpers";
export type { BrokerConfig, StartOptions } from "./core/broker/types";
// ── Dispatch ────────────────────────────────────────────────────────
export { BindingStore } from "./core/binding-store/binding-store";
export type { Binding, BindingId } from "./core/binding-store/types";
export { Dispatcher } from "./core/dispatcher/dispatcher";
export { OwnerScope } from "./core/dispatcher/owner-scope";
export type {
    BootstrapFailure,
    BootstrapReport,
    DispatcherOptions,
    OwnerScopeTarget,
    StaticBinding,
} from "./core/dispatcher/types";
// ── Events ──────────────────────────────────────────────────────────
export { createEvent, eventName } from "./core/event/helpers";
export type { EventDefinition, EventRef } from "./core/event/types";
// ── Handlers ────────────────────────────────────────────────────────
export { createHandler, defaultCallbackName } from "./core/handler/helpers";
export { HandlerRegistry } from "./core/handler/registry";
export type {
    CallbackReference,
    HandlerConfig,
    HandlerDefinition,
    HandlerId,
    LateBoundTarget,
    StaticSubscription,
    SubscriptionDeclaration,
} from "./core/handler/types";
// ── Errors ──────────────────────────────────────────────────────────
export {
    CallbackInvocationError,
    FanbusError,
    InvalidBindingError,
    LifecycleError,
    UnknownCallbackError,
    UnknownHandlerError,
} from "./core/errors";
export type { FanbusErrorCode } from "./core/errors";
// ── Logger ──────────────────────────────────────────────────────────
export { createConsoleHandler } from "./core/logger/console-handler";
export type { ConsoleHandlerOptions } from "./core/logger/console-handler";
export { Logger } from "./core/logger/logger";
export type { LogEntry, LogHandler, LogLevel } from "./core/logger/types";
// ── Shared types ────────────────────────────────────────────────────
export type { Callback, EventName, LoggerContext } from "./core/types";
