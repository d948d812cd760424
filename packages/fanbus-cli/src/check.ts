import { relative } from "node:path";
import type { ScanResult } from "@fanbus/scanner";

export interface ScanProblem {
    handler: string;
    message: string;
}

/**
 * Problems that would make `Broker.start()` skip a static subscription
 * or drop a handler at registration.
 */
export function checkScan(result: ScanResult, root: string): ScanProblem[] {
    const problems: ScanProblem[] = [];
    const firstSeen = new Map<string, string>();

    for (const handler of result.handlers) {
        const file = relative(root, handler.filePath);

        const previous = firstSeen.get(handler.id);
        if (previous !== undefined) {
            problems.push({
                handler: handler.id,
                message: `Duplicate handler id "${handler.id}" in ${file} (first declared in ${previous})`,
            });
        } else {
            firstSeen.set(handler.id, file);
        }

        if (handler.callbacks === null) continue;
        for (const sub of handler.subscriptions) {
            if (!handler.callbacks.includes(sub.callback)) {
                problems.push({
                    handler: handler.id,
                    message: `Handler "${handler.id}" has no callback "${sub.callback}" for "${sub.event}" in ${file}`,
                });
            }
        }
    }

    return problems;
}
