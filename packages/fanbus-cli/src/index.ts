#!/usr/bin/env tsx
import cac from "cac";
import pkg from "../package.json" with { type: "json" };
import { check } from "./commands/check";
import { scan } from "./commands/scan";

const cli = cac("fanbus");

cli.command("scan [dir]", "List handlers and static subscriptions declared with createHandler()")
    .option("-a, --app <app>", "Only bind handlers of this app (repeatable)")
    .option("--json", "Print the manifest as JSON")
    .option("-o, --output <file>", "Write the manifest as JSON to a file")
    .option("-l, --logLevel <level>", "Log level (info | warn | error | silent)")
    .action(scan);

cli.command("check [dir]", "Report duplicate handler ids and subscriptions to missing callbacks")
    .option("-l, --logLevel <level>", "Log level (info | warn | error | silent)")
    .action(check);

cli.help();
cli.version(pkg.version);
cli.parse();
