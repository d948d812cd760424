/**
 * AST Scanner: OXC-based static subscription discovery.
 *
 * Parses TypeScript source files with OXC and extracts metadata from
 * `createHandler()` calls. Only literal values (and `createEvent()` constants
 * declared in the same file) are extracted; anything computed is skipped with
 * a warning.
 */

import { readFile } from "node:fs/promises";
import { defaultCallbackName } from "@fanbus/core";
import { parseSync, Visitor } from "oxc-parser";
import { glob } from "tinyglobby";
import type { ScannedHandler, ScannedSubscription, ScanOptions, ScanResult } from "./types";

type Program = ReturnType<typeof parseSync>["program"];

// ── File filtering ──────────────────────────────────────────────────

const EXCLUDE_PATTERNS = [/\.d\.ts$/, /\.test\.ts$/, /\.spec\.ts$/];

function shouldInclude(filePath: string): boolean {
    return filePath.endsWith(".ts") && !EXCLUDE_PATTERNS.some((p) => p.test(filePath));
}

// ── AST helpers ─────────────────────────────────────────────────────

type ASTNode = { type: string; [key: string]: unknown };

function isNode(value: unknown): value is ASTNode {
    return typeof value === "object" && value !== null && "type" in value && typeof value.type === "string";
}

function isIdentifier(value: unknown): value is ASTNode & { name: string } {
    return isNode(value) && value.type === "Identifier" && typeof value.name === "string";
}

/** Extract a string literal value. Returns null for anything else. */
function getStringLiteral(node: unknown): string | null {
    if (isNode(node) && node.type === "Literal" && typeof node.value === "string") {
        return node.value;
    }
    return null;
}

function nodeList(value: unknown): unknown[] {
    return Array.isArray(value) ? value : [];
}

/** Property key as written: `foo`, `"foo"`. Computed keys yield null. */
function propertyKey(prop: ASTNode): string | null {
    if (prop.computed === true) return null;
    if (isIdentifier(prop.key)) return prop.key.name;
    return getStringLiteral(prop.key);
}

function properties(obj: ASTNode): ASTNode[] {
    return nodeList(obj.properties).filter((p): p is ASTNode => isNode(p) && p.type === "Property");
}

/** Get a property value from an ObjectExpression by key name. */
function getObjectProperty(obj: ASTNode, key: string): unknown {
    for (const prop of properties(obj)) {
        if (propertyKey(prop) === key) return prop.value;
    }
    return null;
}

/**
 * Property names of an ObjectExpression (methods, shorthands and plain properties).
 * Null when a spread or computed key hides part of the object.
 */
function getPropertyNames(obj: ASTNode): string[] | null {
    const names: string[] = [];
    for (const prop of nodeList(obj.properties)) {
        if (!isNode(prop) || prop.type !== "Property") return null;
        const key = propertyKey(prop);
        if (key === null) return null;
        names.push(key);
    }
    return names;
}

function isCallTo(node: unknown, fnName: string): node is ASTNode & { type: "CallExpression" } {
    return isNode(node) && node.type === "CallExpression" && isIdentifier(node.callee) && node.callee.name === fnName;
}

// ── Export detection ────────────────────────────────────────────────

/** Names of variables exported with `export const x` or `export { x }`. */
function extractExportedNames(program: unknown): Set<string> {
    const names = new Set<string>();
    if (!isNode(program)) return names;

    for (const node of nodeList(program.body)) {
        if (!isNode(node) || node.type !== "ExportNamedDeclaration") continue;
        const declaration = node.declaration;

        if (isNode(declaration) && declaration.type === "VariableDeclaration") {
            for (const decl of nodeList(declaration.declarations)) {
                if (isNode(decl) && isIdentifier(decl.id)) names.add(decl.id.name);
            }
        } else if (!declaration) {
            for (const spec of nodeList(node.specifiers)) {
                if (isNode(spec) && spec.type === "ExportSpecifier" && isIdentifier(spec.local)) {
                    names.add(spec.local.name);
                }
            }
        }
    }

    return names;
}

// ── Per-file scanning ───────────────────────────────────────────────

interface FileContext {
    filePath: string;
    warn: (message: string) => void;
    /** `const x = createEvent("name")` → x → "name" */
    events: Map<string, string>;
    /** `const x = { ... }` → x → ObjectExpression */
    objects: Map<string, ASTNode>;
}

function resolveEvent(node: unknown, ctx: FileContext): string | null {
    const literal = getStringLiteral(node);
    if (literal !== null) return literal;
    if (isIdentifier(node)) return ctx.events.get(node.name) ?? null;
    return null;
}

function resolveObject(node: unknown, ctx: FileContext): ASTNode | null {
    if (isNode(node) && node.type === "ObjectExpression") return node;
    if (isIdentifier(node)) return ctx.objects.get(node.name) ?? null;
    return null;
}

function extractSubscriptions(node: unknown, handlerId: string, ctx: FileContext): ScannedSubscription[] {
    const result: ScannedSubscription[] = [];
    if (!isNode(node)) return result;
    if (node.type !== "ArrayExpression") {
        ctx.warn(`[scanner] createHandler("${handlerId}") subscriptions is not an array literal in ${ctx.filePath}`);
        return result;
    }

    for (const element of nodeList(node.elements)) {
        const bare = resolveEvent(element, ctx);
        if (bare !== null) {
            result.push({ event: bare, callback: defaultCallbackName(bare) });
            continue;
        }

        if (isNode(element) && element.type === "ObjectExpression") {
            const event = resolveEvent(getObjectProperty(element, "event"), ctx);
            const callback = getStringLiteral(getObjectProperty(element, "callback"));
            if (event !== null && callback !== null) {
                result.push({ event, callback });
                continue;
            }
        }

        ctx.warn(`[scanner] Skipping non-literal subscription of handler "${handlerId}" in ${ctx.filePath}`);
    }
    return result;
}

function extractHandler(call: ASTNode, varName: string | null, ctx: FileContext): ScannedHandler | null {
    const [config] = nodeList(call.arguments);
    if (!isNode(config) || config.type !== "ObjectExpression") return null;

    const id = getStringLiteral(getObjectProperty(config, "id"));
    if (!id) {
        ctx.warn(`[scanner] Skipping createHandler() with non-literal id in ${ctx.filePath}`);
        return null;
    }

    const appNode = getObjectProperty(config, "app");
    const app = getStringLiteral(appNode);
    const nullLiteral = isNode(appNode) && appNode.type === "Literal" && appNode.value === null;
    if (appNode !== null && app === null && !nullLiteral) {
        ctx.warn(`[scanner] createHandler("${id}") has a non-literal app in ${ctx.filePath}`);
    }

    const callbacksNode = getObjectProperty(config, "callbacks");
    const callbacksObject = resolveObject(callbacksNode, ctx);
    const callbacks = callbacksObject ? getPropertyNames(callbacksObject) : null;
    if (callbacksNode !== null && !callbacksObject) {
        ctx.warn(`[scanner] createHandler("${id}") callbacks is not an object literal in ${ctx.filePath}`);
    } else if (callbacksObject && callbacks === null) {
        ctx.warn(`[scanner] createHandler("${id}") callbacks has a spread or computed key in ${ctx.filePath}`);
    }

    const subscriptions = extractSubscriptions(getObjectProperty(config, "subscriptions"), id, ctx);
    if (callbacks) {
        for (const sub of subscriptions) {
            if (!callbacks.includes(sub.callback)) {
                ctx.warn(
                    `[scanner] Handler "${id}" subscribes "${sub.event}" to missing callback "${sub.callback}" in ${ctx.filePath}`,
                );
            }
        }
    }

    return { id, app, callbacks, subscriptions, filePath: ctx.filePath, varName, exported: false };
}

/** Scan one parsed file for `createHandler()` calls. */
function scanProgram(program: Program, ctx: FileContext): ScannedHandler[] {
    const handlers: ScannedHandler[] = [];
    const varNames = new Map<unknown, string>();

    // Declarators are visited before their initializers.
    const visitor = new Visitor({
        VariableDeclarator(node) {
            const id: unknown = node.id;
            const init: unknown = node.init;
            if (!isIdentifier(id) || !isNode(init)) return;

            if (isCallTo(init, "createEvent")) {
                const [first] = nodeList(init.arguments);
                const name = getStringLiteral(first);
                if (name !== null) ctx.events.set(id.name, name);
            } else if (isCallTo(init, "createHandler")) {
                varNames.set(init, id.name);
            } else if (init.type === "ObjectExpression") {
                ctx.objects.set(id.name, init);
            }
        },
        CallExpression(node) {
            const call: unknown = node;
            if (!isCallTo(call, "createHandler")) return;
            const handler = extractHandler(call, varNames.get(call) ?? null, ctx);
            if (handler) handlers.push(handler);
        },
    });

    visitor.visit(program);
    return handlers;
}

// ── File discovery ──────────────────────────────────────────────────

async function discoverFiles(basePath: string): Promise<string[]> {
    const paths = await glob(["**/*.ts"], { cwd: basePath, absolute: true, ignore: ["**/node_modules/**"] });
    return paths.filter(shouldInclude).sort();
}

// ── Main scan function ──────────────────────────────────────────────

/**
 * Scan TypeScript source files and extract handler metadata.
 *
 * @param basePath - Root directory to scan (e.g., `./src`)
 * @returns Every `createHandler()` call with a literal id, in file order.
 */
export async function scan(basePath: string, options: ScanOptions = {}): Promise<ScanResult> {
    const warn = options.onWarning ?? ((message: string) => console.warn(message));
    const files = await discoverFiles(basePath);
    const handlers: ScannedHandler[] = [];

    for (const filePath of files) {
        const source = await readFile(filePath, "utf-8");
        const result = parseSync(filePath, source, { sourceType: "module" });

        for (const err of result.errors) {
            warn(`[scanner] Parse error in ${filePath}: ${err.message}`);
        }

        const ctx: FileContext = { filePath, warn, events: new Map(), objects: new Map() };
        const exportedNames = extractExportedNames(result.program);
        for (const handler of scanProgram(result.program, ctx)) {
            handlers.push({ ...handler, exported: handler.varName !== null && exportedNames.has(handler.varName) });
        }
    }

    return { handlers };
}
