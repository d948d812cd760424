/**
 * Terminal output for the fanbus commands, gated by `--logLevel`.
 */

export const dim = "\x1b[90m";
export const cyan = "\x1b[36m";
export const reset = "\x1b[0m";
const yellow = "\x1b[33m";
const green = "\x1b[32m";
const red = "\x1b[31m";
const bold = "\x1b[1m";

// ── Level gating ────────────────────────────────────────────────────

export type LogLevel = "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = { info: 0, warn: 1, error: 2, silent: 3 };

let threshold: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
    return Object.hasOwn(RANK, value);
}

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

function enabled(level: Exclude<LogLevel, "silent">): boolean {
    return RANK[level] >= RANK[threshold];
}

// ── Messages ────────────────────────────────────────────────────────

export function banner(command: string, dir: string): void {
    if (!enabled("info")) return;
    console.log(`\n${bold}${yellow}⚡ fanbus ${command}${reset} → ${cyan}${dir}${reset}\n`);
}

/** Indented output line, used for listings. */
export function line(text: string): void {
    if (enabled("info")) console.log(`  ${text}`);
}

export function info(text: string): void {
    if (enabled("info")) console.log(`  ${dim}▸${reset} ${text}`);
}

export function note(text: string): void {
    if (enabled("info")) console.log(`    ${dim}${text}${reset}`);
}

export function warn(text: string): void {
    if (enabled("warn")) console.log(`  ${yellow}⚠ ${text}${reset}`);
}

export function error(text: string): void {
    if (enabled("error")) console.error(`  ${red}✗ ${text}${reset}`);
}

// ── Timed steps: "scan ····· ✓ 12ms  2 handler(s)" ──────────────────

const LABEL_WIDTH = 26;

function leader(label: string): string {
    return `${label} ${dim}${"·".repeat(Math.max(2, LABEL_WIDTH - label.length - 1))}${reset}`;
}

function formatDuration(ms: number): string {
    if (ms < 1000) return `${ms}ms`;
    const seconds = ms / 1000;
    if (seconds < 60) return `${seconds.toFixed(1)}s`;
    const rest = String(Math.round(seconds % 60)).padStart(2, "0");
    return `${Math.floor(seconds / 60)}m${rest}s`;
}

/** Returns a function that formats the time elapsed since the call. */
export function startTimer(): () => string {
    const startedAt = Date.now();
    return () => formatDuration(Date.now() - startedAt);
}

export function step(label: string, duration: string, summary?: string): void {
    if (!enabled("info")) return;
    const suffix = summary ? `  ${dim}${summary}${reset}` : "";
    console.log(`  ${leader(label)} ${green}✓ ${duration.padStart(5)}${reset}${suffix}`);
}

export function stepFail(label: string, message: string): void {
    if (enabled("error")) console.error(`  ${leader(label)} ${red}✗ ${message}${reset}`);
}
