import type { StaticSubscription } from "@fanbus/core";
import type { ScanResult } from "./types";

/**
 * Flatten a scan result into `(event, handler, callback)` triples.
 *
 * `apps` scopes the result the same way `HandlerRegistry.discover` does:
 * omitted means every handler, `[]` means none.
 */
export function toStaticBindings(result: ScanResult, apps?: readonly string[]): StaticSubscription[] {
    const scope = apps ? new Set(apps) : null;
    return result.handlers
        .filter((handler) => scope === null || (handler.app !== null && scope.has(handler.app)))
        .flatMap((handler) =>
            handler.subscriptions.map((sub) => ({ event: sub.event, handler: handler.id, callback: sub.callback })),
        );
}
