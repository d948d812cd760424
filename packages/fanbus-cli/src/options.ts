import { error, isLogLevel, setLogLevel } from "./logger";

export interface CommonOptions {
    logLevel?: string;
}

/** Apply `--logLevel`. Unknown values exit with an error. */
export function applyLogLevel(options: CommonOptions): void {
    if (options.logLevel === undefined) return;
    if (!isLogLevel(options.logLevel)) {
        error(`Unknown --logLevel "${options.logLevel}". Valid values: info, warn, error, silent.`);
        process.exit(1);
    }
    setLogLevel(options.logLevel);
}

/** cac yields a string for one `--app` and an array for several. */
export function toAppList(value: string | string[] | undefined): string[] | undefined {
    if (value === undefined) return undefined;
    return Array.isArray(value) ? value.map(String) : [String(value)];
}
