import { relative } from "node:path";
import type { ScanResult } from "@fanbus/scanner";
import { toStaticBindings } from "@fanbus/scanner";
import { cyan, dim, reset } from "./logger";

/** JSON manifest written by `fanbus scan --json`. */
export interface ScanManifest {
    handlers: ScanResult["handlers"];
    bindings: ReturnType<typeof toStaticBindings>;
}

export function createManifest(result: ScanResult, root: string, apps?: readonly string[]): ScanManifest {
    return {
        handlers: result.handlers.map((handler) => ({ ...handler, filePath: relative(root, handler.filePath) })),
        bindings: toStaticBindings(result, apps),
    };
}

/** Human-readable handler listing, one block per handler. */
export function formatHandlers(result: ScanResult, root: string): string[] {
    const lines: string[] = [];

    for (const handler of result.handlers) {
        const app = handler.app ? ` ${dim}(${handler.app})${reset}` : "";
        lines.push(`${cyan}${handler.id}${reset}${app}  ${dim}${relative(root, handler.filePath)}${reset}`);

        if (handler.subscriptions.length === 0) {
            lines.push(`    ${dim}no static subscriptions${reset}`);
            continue;
        }
        for (const sub of handler.subscriptions) {
            lines.push(`    ${sub.event} ${dim}→${reset} ${handler.id}.${sub.callback}`);
        }
    }

    return lines;
}
