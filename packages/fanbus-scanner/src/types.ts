/**
 * Scan result types.
 *
 * These are the shapes the AST scanner produces; `toStaticBindings` flattens
 * them into the triples the broker bootstraps from.
 */

export interface ScannedSubscription {
    event: string;
    callback: string;
}

export interface ScannedHandler {
    id: string;
    app: string | null;
    /** Callback names, or null when `callbacks` is not statically known. */
    callbacks: string[] | null;
    subscriptions: ScannedSubscription[];
    filePath: string;
    varName: string | null;
    exported: boolean;
}

export interface ScanResult {
    handlers: ScannedHandler[];
}

export interface ScanOptions {
    /** Receives every scanner warning. Defaults to `console.warn`. */
    onWarning?: (message: string) => void;
}
