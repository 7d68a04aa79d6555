#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { config } from "./config.js";
import { logger } from "./logger.js";
import { buildCli, packageVersion, RunCommand } from "./cli.js";
import { describeFailure, exitCodeFor, runReport } from "./report.js";

let lastOutputPath: string | undefined;

async function main() {
    const controller = new AbortController();
    const onSignal = (signal: NodeJS.Signals) => {
        logger.warn("Interrupt received; stopping", { signal });
        controller.abort(new Error(`Received ${signal}`));
    };
    process.once("SIGINT", onSignal);
    process.once("SIGTERM", onSignal);

    await buildCli(hideBin(process.argv), config, {
        run: async (command: RunCommand) => {
            lastOutputPath = command.outputPath;
            const result = await runReport(command, config, {
                signal: controller.signal,
            });
            console.log(
                `Wrote ${result.records.length} records to ${result.outputPath}`,
            );
        },
        showConfig: () => {
            console.log(
                JSON.stringify(
                    {
                        SLACK_TOKEN: config.slackToken ? "set" : "unset",
                        MIN_INTERVAL_SEC: config.minIntervalSec,
                        MAX_RETRY: config.maxRetry,
                        MONTHS: config.months,
                        OUTPUT_PATH: config.outputPath,
                        LOG_LEVEL: config.logLevel,
                        COUNT_REACTIONS: config.countReactions,
                        USE_FAKE_API: config.useFakeApi,
                    },
                    null,
                    2,
                ),
            );
        },
        version: () => console.log(`emoji-usage ${packageVersion()}`),
    }).parseAsync();
}

main().catch((e) => {
    logger.error("Fatal", { error: describeFailure(e, lastOutputPath) });
    process.exit(exitCodeFor(e));
});
