import { resolve } from "node:path";
import { scan } from "@fanbus/scanner";
import { checkScan } from "../check";
import { banner, error, startTimer, step, stepFail, warn } from "../logger";
import type { CommonOptions } from "../options";
import { applyLogLevel } from "../options";

export async function check(dir: string | undefined, options: CommonOptions): Promise<void> {
    applyLogLevel(options);
    const root = resolve(process.cwd(), dir ?? "src");

    banner("check", root);
    const elapsed = startTimer();
    const result = await scan(root, { onWarning: warn });
    const problems = checkScan(result, root);

    if (problems.length === 0) {
        step("check", elapsed(), `${result.handlers.length} handler(s)`);
        return;
    }

    stepFail("check", `${problems.length} problem(s)`);
    for (const problem of problems) {
        error(problem.message);
    }
    process.exitCode = 1;
}
