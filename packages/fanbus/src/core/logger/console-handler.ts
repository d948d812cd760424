import type { LogEntry, LogLevel } from "./types";

const dim = "\x1b[90m";
const cyan = "\x1b[36m";
const green = "\x1b[32m";
const yellow = "\x1b[33m";
const red = "\x1b[31m";
const magenta = "\x1b[35m";
const reset = "\x1b[0m";

const LEVEL_COLOR: Record<LogLevel, string> = { debug: dim, info: cyan, warn: yellow, error: red };

export type ConsoleHandlerOptions = {
    /** ANSI colors in the output. Defaults to `true`. */
    colors?: boolean;
};

function formatTime(ts: number): string {
    const d = new Date(ts);
    const h = String(d.getHours()).padStart(2, "0");
    const m = String(d.getMinutes()).padStart(2, "0");
    const s = String(d.getSeconds()).padStart(2, "0");
    return `${h}:${m}:${s}`;
}

function colorizeValue(value: unknown): string {
    if (value === null) return `${magenta}null${reset}`;
    if (value === undefined) return `${dim}undefined${reset}`;
    if (typeof value === "string") return `${green}"${value}"${reset}`;
    if (typeof value === "number" || typeof value === "boolean") return `${yellow}${value}${reset}`;
    if (Array.isArray(value)) {
        if (value.length === 0) return "[]";
        return `[${value.map(colorizeValue).join(`${dim},${reset} `)}]`;
    }
    if (typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        const pairs = entries.map(([k, v]) => `${cyan}${k}${reset}${dim}:${reset} ${colorizeValue(v)}`);
        return `${dim}{${reset} ${pairs.join(`${dim},${reset} `)} ${dim}}${reset}`;
    }
    return String(value);
}

function plainValue(value: unknown): string {
    if (value === undefined) return "undefined";
    if (typeof value === "string") return `"${value}"`;
    if (Array.isArray(value)) return `[${value.map(plainValue).join(", ")}]`;
    if (value !== null && typeof value === "object") {
        const entries = Object.entries(value);
        if (entries.length === 0) return "{}";
        return `{ ${entries.map(([k, v]) => `${k}: ${plainValue(v)}`).join(", ")} }`;
    }
    return String(value);
}

/**
 * Formats entries as `HH:MM:SS [level] code → message { details }` and writes
 * them to `console.error` (error), `console.warn` (warn) or `console.log`.
 */
export function createConsoleHandler(options: ConsoleHandlerOptions = {}): (entry: LogEntry) => void {
    const colors = options.colors ?? true;

    return (entry: LogEntry) => {
        const time = formatTime(entry.timestamp);
        const tag = colors ? `${LEVEL_COLOR[entry.level]}[${entry.level}]${reset}` : `[${entry.level}]`;
        const format = colors ? colorizeValue : plainValue;
        const detailsPart = entry.details ? ` ${format(entry.details)}` : "";
        const line = `${time} ${tag} ${entry.code} → ${entry.message}${detailsPart}`;

        if (entry.level === "error") {
            console.error(line);
        } else if (entry.level === "warn") {
            console.warn(line);
        } else {
            console.log(line);
        }
    };
}
