import { Config, validateConfig } from "./config.js";
import { RunCommand } from "./cli.js";
import { setLogLevel } from "./logger.js";
import { AggregationAbortedError } from "./domain/errors.js";
import { Clock } from "./domain/ports/clock.js";
import { ResultSink } from "./domain/ports/resultSink.js";
import { WorkspaceApi } from "./domain/ports/workspaceApi.js";
import { IntervalRateLimiter } from "./application/rateLimiter.js";
import { RetryPolicy } from "./application/retryPolicy.js";
import { ReportResult, UsageReportWorkflow, partialPathFor } from "./application/workflow.js";
import { formatMonth } from "./application/monthWindow.js";
import { CsvResultSink } from "./infra/csv/csvResultSink.js";
import { FakeWorkspaceApi } from "./infra/fake/fakeWorkspaceApi.js";
import { SlackWorkspaceApi } from "./infra/slack/slackWorkspaceApi.js";
import { loadStandardEmojiNames } from "./infra/emoji/standardEmoji.js";
import { systemClock } from "./util/time.js";

export interface RunOverrides {
    signal?: AbortSignal;
    clock?: Clock;
    api?: WorkspaceApi;
    sink?: ResultSink;
    anchor?: Date;
    standardNames?: readonly string[];
}

/** Wires one run: one limiter, one retry policy and one API client for its lifetime. */
export async function runReport(
    command: RunCommand,
    cfg: Config,
    overrides: RunOverrides = {},
): Promise<ReportResult> {
    const effective: Config = {
        ...cfg,
        minIntervalSec: command.minIntervalSec,
        maxRetry: command.maxRetry,
        months: command.months,
        outputPath: command.outputPath,
        logLevel: command.logLevel.toLowerCase(),
        countReactions: command.countReactions,
        useFakeApi: command.useFakeApi,
    };
    validateConfig(effective);
    setLogLevel(effective.logLevel);

    const clock = overrides.clock ?? systemClock;
    const limiter = new IntervalRateLimiter(effective.minIntervalSec * 1000, clock);
    const policy = new RetryPolicy(limiter, {
        maxRetry: effective.maxRetry,
        clock,
        signal: overrides.signal,
    });
    const api =
        overrides.api ??
        (effective.useFakeApi
            ? new FakeWorkspaceApi()
            : new SlackWorkspaceApi(effective.slackToken));

    const workflow = new UsageReportWorkflow({
        api,
        policy,
        sink: overrides.sink ?? new CsvResultSink(),
        standardNames: overrides.standardNames ?? loadStandardEmojiNames(),
        countReactions: effective.countReactions,
        signal: overrides.signal,
    });

    return workflow.run({
        months: effective.months,
        outputPath: effective.outputPath,
        filter: command.filter,
        maxEmojis: command.maxEmojis,
        anchor: overrides.anchor,
    });
}

/** One-line diagnostic for the terminal. */
export function describeFailure(e: unknown, outputPath?: string): string {
    if (e instanceof AggregationAbortedError) {
        const where = e.cell
            ? `while measuring :${e.cell.emoji.name}: (${e.cell.emoji.kind}) for ${formatMonth(e.cell.period)}`
            : "before the first cell";
        const cause = e.cause instanceof Error ? `${e.cause.name}: ${e.cause.message}` : String(e.cause);
        const saved =
            e.collected > 0 && outputPath
                ? ` Partial results: ${partialPathFor(outputPath)}.`
                : "";
        const verb = e.reason === "interrupted" ? "Interrupted" : "Failed";
        return `${verb} ${where} with ${e.collected} records collected. ${cause}.${saved}`;
    }
    if (e instanceof Error) return `${e.name}: ${e.message}`;
    return String(e);
}

export function exitCodeFor(e: unknown): number {
    return e instanceof AggregationAbortedError && e.reason === "interrupted" ? 130 : 1;
}
