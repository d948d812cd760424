import type { LoggerContext } from "../types";
import type { LogEntry, LogHandler, LogLevel } from "./types";

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Transport-based logger. Entries below `level` are dropped before any
 * handler sees them; without handlers the logger is silent.
 */
export class Logger implements LoggerContext {
    private readonly handlers: Set<LogHandler> = new Set();

    constructor(private minLevel: LogLevel = "debug") {}

    get level(): LogLevel {
        return this.minLevel;
    }

    setLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    addHandler(handler: LogHandler): void {
        this.handlers.add(handler);
    }

    removeHandler(handler: LogHandler): void {
        this.handlers.delete(handler);
    }

    debug(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("debug", code, message, details);
    }

    info(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("info", code, message, details);
    }

    warn(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("warn", code, message, details);
    }

    error(code: string, message: string, details?: Record<string, unknown>): void {
        this.emit("error", code, message, details);
    }

    private emit(level: LogLevel, code: string, message: string, details?: Record<string, unknown>): void {
        if (SEVERITY[level] < SEVERITY[this.minLevel]) return;
        const entry: LogEntry = { level, code, message, details, timestamp: Date.now() };
        for (const handler of this.handlers) {
            handler(entry);
        }
    }
}
