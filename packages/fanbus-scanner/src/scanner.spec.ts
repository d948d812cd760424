import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { describe, expect, it, vi } from "vitest";
import { scan } from "./scanner";
import type { ScannedHandler, ScanResult } from "./types";

/** Create a temp dir with given files, run scan, clean up. */
async function scanFixture(files: Record<string, string>, warnings: string[] = []): Promise<ScanResult> {
    const dir = mkdtempSync(join(tmpdir(), "fanbus-scan-"));
    try {
        for (const [name, content] of Object.entries(files)) {
            const path = join(dir, name);
            mkdirSync(dirname(path), { recursive: true });
            writeFileSync(path, content);
        }
        return await scan(dir, { onWarning: (message) => warnings.push(message) });
    } finally {
        rmSync(dir, { recursive: true, force: true });
    }
}

function byId(result: ScanResult, id: string): ScannedHandler {
    const handler = result.handlers.find((h) => h.id === id);
    if (!handler) throw new Error(`handler "${id}" not found`);
    return handler;
}

// ── Shared fixture: mailer (exported const, callbacks by reference),
//    invoicer (exported by specifier), audit (anonymous, no app) ──

const HANDLERS_FIXTURE = {
    "handlers.ts": `
import { createEvent, createHandler } from "@fanbus/core";

export const OrderPlaced = createEvent<{ id: string }>("order_placed");

const mailerCallbacks = {
    onUserCreated() {},
    sendReceipt: () => {},
};

export const mailer = createHandler({
    id: "mailer",
    app: "notifications",
    callbacks: mailerCallbacks,
    subscriptions: ["user_created", { event: OrderPlaced, callback: "sendReceipt" }],
});

const invoicer = createHandler({
    id: "invoicer",
    app: "billing",
    callbacks: { onOrderPlaced() {}, archive() {} },
    subscriptions: [OrderPlaced],
});

createHandler({
    id: "audit",
    callbacks: { onUserCreated },
    subscriptions: [{ event: "user_created", callback: "onUserCreated" }],
});

export { invoicer };
`,
};

describe("scan()", () => {
    it("discovers handlers in declaration order", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);
        expect(result.handlers.map((h) => h.id)).toEqual(["mailer", "invoicer", "audit"]);
    });

    it("extracts app and callback names", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);

        const mailer = byId(result, "mailer");
        expect(mailer.app).toBe("notifications");
        expect(mailer.callbacks).toEqual(["onUserCreated", "sendReceipt"]);

        const invoicer = byId(result, "invoicer");
        expect(invoicer.app).toBe("billing");
        expect(invoicer.callbacks).toEqual(["onOrderPlaced", "archive"]);

        const audit = byId(result, "audit");
        expect(audit.app).toBeNull();
        expect(audit.callbacks).toEqual(["onUserCreated"]);
    });

    it("applies the default callback name to bare events", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);
        expect(byId(result, "mailer").subscriptions[0]).toEqual({ event: "user_created", callback: "onUserCreated" });
    });

    it("resolves createEvent() constants declared in the same file", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);
        expect(byId(result, "mailer").subscriptions[1]).toEqual({ event: "order_placed", callback: "sendReceipt" });
        expect(byId(result, "invoicer").subscriptions).toEqual([{ event: "order_placed", callback: "onOrderPlaced" }]);
    });

    it("keeps explicit callback names", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);
        expect(byId(result, "audit").subscriptions).toEqual([{ event: "user_created", callback: "onUserCreated" }]);
    });

    it("records variable name and export status", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);

        expect(byId(result, "mailer")).toMatchObject({ varName: "mailer", exported: true });
        expect(byId(result, "invoicer")).toMatchObject({ varName: "invoicer", exported: true });
        expect(byId(result, "audit")).toMatchObject({ varName: null, exported: false });
    });

    it("records the source file path", async () => {
        const result = await scanFixture(HANDLERS_FIXTURE);
        expect(byId(result, "mailer").filePath.endsWith("handlers.ts")).toBe(true);
    });

    it("emits no warnings for fully literal handlers", async () => {
        const warnings: string[] = [];
        await scanFixture(HANDLERS_FIXTURE, warnings);
        expect(warnings).toEqual([]);
    });

    it("scans nested directories in path order", async () => {
        const result = await scanFixture({
            "b/second.ts": `createHandler({ id: "second", callbacks: {} });`,
            "a/first.ts": `createHandler({ id: "first", callbacks: {} });`,
        });
        expect(result.handlers.map((h) => h.id)).toEqual(["first", "second"]);
    });

    it("excludes test files, declaration files and node_modules", async () => {
        const source = `createHandler({ id: "hidden", callbacks: {} });`;
        const result = await scanFixture({
            "mailer.spec.ts": source,
            "mailer.test.ts": source,
            "types.d.ts": source,
            "node_modules/pkg/index.ts": source,
        });
        expect(result.handlers).toEqual([]);
    });

    it("returns an empty result when nothing declares a handler", async () => {
        const result = await scanFixture({ "util.ts": `export const x = 1;` });
        expect(result).toEqual({ handlers: [] });
    });
});

describe("scan() warnings", () => {
    it("skips handlers whose id is not a literal", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            { "dynamic.ts": `const id = "dynamic";\ncreateHandler({ id, callbacks: {} });` },
            warnings,
        );

        expect(result.handlers).toEqual([]);
        expect(warnings).toEqual([expect.stringContaining("[scanner] Skipping createHandler() with non-literal id")]);
    });

    it("skips computed subscriptions and flags missing callbacks", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            {
                "partial.ts": `
createHandler({
    id: "partial",
    callbacks: { onA() {} },
    subscriptions: ["a", { event: eventFor("b"), callback: "onB" }, { event: "c", callback: "missing" }],
});
`,
            },
            warnings,
        );

        expect(byId(result, "partial").subscriptions).toEqual([
            { event: "a", callback: "onA" },
            { event: "c", callback: "missing" },
        ]);
        expect(warnings).toEqual([
            expect.stringContaining('[scanner] Skipping non-literal subscription of handler "partial"'),
            expect.stringContaining('[scanner] Handler "partial" subscribes "c" to missing callback "missing"'),
        ]);
    });

    it("warns when subscriptions is not an array literal", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            { "list.ts": `createHandler({ id: "list", callbacks: {}, subscriptions: declared });` },
            warnings,
        );

        expect(byId(result, "list").subscriptions).toEqual([]);
        expect(warnings).toEqual([
            expect.stringContaining('[scanner] createHandler("list") subscriptions is not an array literal'),
        ]);
    });

    it("warns when callbacks cannot be resolved and skips the callback check", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            { "built.ts": `createHandler({ id: "built", callbacks: build(), subscriptions: ["x"] });` },
            warnings,
        );

        const built = byId(result, "built");
        expect(built.callbacks).toBeNull();
        expect(built.subscriptions).toEqual([{ event: "x", callback: "onX" }]);
        expect(warnings).toEqual([
            expect.stringContaining('[scanner] createHandler("built") callbacks is not an object literal'),
        ]);
    });

    it("treats callbacks with a spread as not statically known", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            {
                "spread.ts": `
const shared = { onUserCreated() {} };
createHandler({ id: "spread", callbacks: { ...shared, other() {} }, subscriptions: ["user_created"] });
`,
            },
            warnings,
        );

        const spread = byId(result, "spread");
        expect(spread.callbacks).toBeNull();
        expect(spread.subscriptions).toEqual([{ event: "user_created", callback: "onUserCreated" }]);
        expect(warnings).toEqual([
            expect.stringContaining('[scanner] createHandler("spread") callbacks has a spread or computed key'),
        ]);
    });

    it("treats callbacks with a computed key as not statically known", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            {
                "computed.ts": `
const name = "onA";
createHandler({ id: "computed", callbacks: { [name]() {} }, subscriptions: ["a"] });
`,
            },
            warnings,
        );

        expect(byId(result, "computed").callbacks).toBeNull();
        expect(warnings).toEqual([
            expect.stringContaining('[scanner] createHandler("computed") callbacks has a spread or computed key'),
        ]);
    });

    it("warns when app is not a literal", async () => {
        const warnings: string[] = [];
        const result = await scanFixture(
            { "app.ts": `createHandler({ id: "scoped", app: APP, callbacks: {} });` },
            warnings,
        );

        expect(byId(result, "scoped").app).toBeNull();
        expect(warnings).toEqual([expect.stringContaining('[scanner] createHandler("scoped") has a non-literal app')]);
    });

    it("reports parse errors", async () => {
        const warnings: string[] = [];
        await scanFixture({ "broken.ts": `const = ;` }, warnings);
        expect(warnings.some((w) => w.startsWith("[scanner] Parse error in"))).toBe(true);
    });

    it("falls back to console.warn", async () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
        const dir = mkdtempSync(join(tmpdir(), "fanbus-scan-"));
        try {
            writeFileSync(join(dir, "dynamic.ts"), `createHandler({ id: makeId(), callbacks: {} });`);
            await scan(dir);
            expect(warn).toHaveBeenCalledWith(
                expect.stringContaining("[scanner] Skipping createHandler() with non-literal id"),
            );
        } finally {
            rmSync(dir, { recursive: true, force: true });
            warn.mockRestore();
        }
    });
});
