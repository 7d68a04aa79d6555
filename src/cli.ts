import { readFileSync } from "node:fs";
import yargs, { Argv } from "yargs";
import { Config } from "./config.js";
import { EmojiFilter } from "./application/emojiCatalog.js";

export interface RunCommand {
    months: number;
    outputPath: string;
    filter: EmojiFilter;
    maxEmojis?: number;
    minIntervalSec: number;
    maxRetry: number;
    countReactions: boolean;
    useFakeApi: boolean;
    logLevel: string;
}

export interface CliHandlers {
    run(command: RunCommand): Promise<void>;
    showConfig(): void;
    version(): void;
}

export const TEST_OUTPUT_PATH = "test_emoji_usage.csv";

export function packageVersion(): string {
    const raw: unknown = JSON.parse(
        readFileSync(new URL("../package.json", import.meta.url), "utf8"),
    );
    if (typeof raw === "object" && raw !== null && "version" in raw) {
        return String(raw.version);
    }
    return "0.0.0";
}

function withRateOptions<T>(y: Argv<T>, cfg: Config) {
    return y
        .option("min-interval", {
            type: "number",
            default: cfg.minIntervalSec,
            describe: "Minimum seconds between API calls",
        })
        .option("max-retry", {
            type: "number",
            default: cfg.maxRetry,
            describe: "Retries per call after a 429 response",
        })
        .option("reactions", {
            type: "boolean",
            default: cfg.countReactions,
            describe: "Also count reactions (--no-reactions to skip)",
        })
        .option("fake", {
            type: "boolean",
            default: cfg.useFakeApi,
            describe: "Use a deterministic fake API instead of Slack",
        })
        .option("log-level", {
            type: "string",
            default: cfg.logLevel,
            describe: "debug | info | warn | error",
        })
        .option("verbose", {
            alias: "v",
            type: "boolean",
            default: false,
            describe: "Shorthand for --log-level debug",
        });
}

export function buildCli(args: string[], cfg: Config, handlers: CliHandlers) {
    return yargs(args)
        .scriptName("emoji-usage")
        .usage("$0 [command] [options]\n\nMonthly emoji usage for a Slack workspace, paced under its rate limits.")
        .command(
            "$0",
            "Aggregate emoji usage and write a CSV",
            (y) =>
                withRateOptions(y, cfg)
                    .option("months", {
                        alias: "m",
                        type: "number",
                        default: cfg.months,
                        describe: "Number of calendar months, ending with the current one",
                    })
                    .option("output", {
                        alias: "o",
                        type: "string",
                        default: cfg.outputPath,
                        describe: "CSV output path",
                    })
                    .option("only-standard", {
                        type: "boolean",
                        default: false,
                        describe: "Standard emoji only",
                    })
                    .option("only-custom", {
                        type: "boolean",
                        default: false,
                        describe: "Workspace custom emoji only",
                    })
                    .option("standard", {
                        type: "boolean",
                        default: true,
                        describe: "Include standard emoji (--no-standard to exclude)",
                    })
                    .option("custom", {
                        type: "boolean",
                        default: true,
                        describe: "Include custom emoji (--no-custom to exclude)",
                    })
                    .option("max-emojis", {
                        type: "number",
                        describe: "Cap on the number of emoji measured",
                    }),
            (argv) =>
                handlers.run({
                    months: argv.months,
                    outputPath: argv.output,
                    filter: {
                        onlyStandard: argv["only-standard"],
                        onlyCustom: argv["only-custom"],
                        noStandard: !argv.standard,
                        noCustom: !argv.custom,
                    },
                    maxEmojis: argv["max-emojis"],
                    minIntervalSec: argv["min-interval"],
                    maxRetry: argv["max-retry"],
                    countReactions: argv.reactions,
                    useFakeApi: argv.fake,
                    logLevel: argv.verbose ? "debug" : argv["log-level"],
                }),
        )
        .command(
            "test",
            `Quick standard-emoji run into ${TEST_OUTPUT_PATH}`,
            (y) =>
                withRateOptions(y, cfg)
                    .option("emoji-count", {
                        alias: "e",
                        type: "number",
                        default: 5,
                        describe: "Number of emoji to measure",
                    })
                    .option("months", {
                        alias: "m",
                        type: "number",
                        default: 2,
                        describe: "Number of months",
                    }),
            (argv) =>
                handlers.run({
                    months: argv.months,
                    outputPath: TEST_OUTPUT_PATH,
                    filter: { onlyStandard: true },
                    maxEmojis: argv["emoji-count"],
                    minIntervalSec: argv["min-interval"],
                    maxRetry: argv["max-retry"],
                    countReactions: argv.reactions,
                    useFakeApi: argv.fake,
                    logLevel: argv.verbose ? "debug" : argv["log-level"],
                }),
        )
        .command("config", "Show the effective configuration", {}, () =>
            handlers.showConfig(),
        )
        .command("version", "Show the version", {}, () => handlers.version())
        .version(false)
        .strict()
        .help()
        .fail(false);
}
