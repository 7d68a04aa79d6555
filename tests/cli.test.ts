import { describe, it, expect, vi } from "vitest";
import { buildCli, CliHandlers, TEST_OUTPUT_PATH } from "../src/cli.js";
import { Config } from "../src/config.js";

const cfg: Config = {
    slackToken: "test-token",
    minIntervalSec: 5,
    maxRetry: 3,
    months: 12,
    outputPath: "emoji_usage.csv",
    logLevel: "info",
    countReactions: true,
    useFakeApi: false,
};

function makeHandlers() {
    return {
        run: vi.fn(async () => {}),
        showConfig: vi.fn(),
        version: vi.fn(),
    } satisfies CliHandlers;
}

describe("buildCli", () => {
    it("fills the run command from defaults", async () => {
        const handlers = makeHandlers();

        await buildCli([], cfg, handlers).parseAsync();

        expect(handlers.run).toHaveBeenCalledWith({
            months: 12,
            outputPath: "emoji_usage.csv",
            filter: { onlyStandard: false, onlyCustom: false, noStandard: false, noCustom: false },
            maxEmojis: undefined,
            minIntervalSec: 5,
            maxRetry: 3,
            countReactions: true,
            useFakeApi: false,
            logLevel: "info",
        });
    });

    it("maps filter flags and overrides", async () => {
        const handlers = makeHandlers();

        await buildCli(
            ["--no-custom", "-m", "3", "-o", "out.csv", "--max-emojis", "10", "--no-reactions", "-v"],
            cfg,
            handlers,
        ).parseAsync();

        expect(handlers.run).toHaveBeenCalledWith(
            expect.objectContaining({
                months: 3,
                outputPath: "out.csv",
                filter: { onlyStandard: false, onlyCustom: false, noStandard: false, noCustom: true },
                maxEmojis: 10,
                countReactions: false,
                logLevel: "debug",
            }),
        );
    });

    it("runs a small standard-only job for the test command", async () => {
        const handlers = makeHandlers();

        await buildCli(["test", "--emoji-count", "3"], cfg, handlers).parseAsync();

        expect(handlers.run).toHaveBeenCalledWith(
            expect.objectContaining({
                months: 2,
                outputPath: TEST_OUTPUT_PATH,
                filter: { onlyStandard: true },
                maxEmojis: 3,
            }),
        );
    });

    it("dispatches the config and version commands", async () => {
        const handlers = makeHandlers();

        await buildCli(["config"], cfg, handlers).parseAsync();
        await buildCli(["version"], cfg, handlers).parseAsync();

        expect(handlers.showConfig).toHaveBeenCalledTimes(1);
        expect(handlers.version).toHaveBeenCalledTimes(1);
        expect(handlers.run).not.toHaveBeenCalled();
    });
});
