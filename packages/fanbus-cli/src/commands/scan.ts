import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { scan as scanHandlers } from "@fanbus/scanner";
import { createManifest, formatHandlers } from "../format";
import { banner, info, line, note, startTimer, step, warn } from "../logger";
import type { CommonOptions } from "../options";
import { applyLogLevel, toAppList } from "../options";

interface ScanOptions extends CommonOptions {
    app?: string | string[];
    json?: boolean;
    output?: string;
}

export async function scan(dir: string | undefined, options: ScanOptions): Promise<void> {
    applyLogLevel(options);
    const root = resolve(process.cwd(), dir ?? "src");
    const apps = toAppList(options.app);

    if (options.json && !options.output) {
        // Stdout carries the manifest only.
        const result = await scanHandlers(root, { onWarning: (message) => console.error(message) });
        console.log(JSON.stringify(createManifest(result, root, apps), null, 2));
        return;
    }

    banner("scan", root);
    const elapsed = startTimer();
    const result = await scanHandlers(root, { onWarning: warn });
    const manifest = createManifest(result, root, apps);
    step("scan", elapsed(), `${manifest.handlers.length} handler(s), ${manifest.bindings.length} binding(s)`);

    if (options.output) {
        const outputPath = resolve(process.cwd(), options.output);
        await mkdir(dirname(outputPath), { recursive: true });
        await writeFile(outputPath, `${JSON.stringify(manifest, null, 2)}\n`);
        info(`Wrote ${outputPath}`);
        return;
    }

    line("");
    for (const text of formatHandlers(result, root)) {
        line(text);
    }
    if (apps) {
        line("");
        note(`Bindings scoped to app(s): ${apps.length > 0 ? apps.join(", ") : "(none)"}`);
    }
}
