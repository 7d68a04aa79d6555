import path from "node:path";
import { Emoji, MonthPeriod, UsageRecord } from "../domain/models.js";
import { AggregationAbortedError, AuthError, ConfigError } from "../domain/errors.js";
import { ResultSink } from "../domain/ports/resultSink.js";
import { WorkspaceApi } from "../domain/ports/workspaceApi.js";
import { RetryPolicy } from "./retryPolicy.js";
import {
    EmojiCatalog,
    EmojiFilter,
    assertMaxEmojis,
    resolveSelection,
} from "./emojiCatalog.js";
import { buildMonthWindow, formatMonth } from "./monthWindow.js";
import { UsageProbe } from "./usageProbe.js";
import { Aggregator } from "./aggregator.js";
import { RunStatistics, summarize } from "./statistics.js";
import { logger } from "../logger.js";

export interface ReportOptions {
    months: number;
    outputPath: string;
    filter: EmojiFilter;
    maxEmojis?: number;
    anchor?: Date;
}

export interface ReportDeps {
    api: WorkspaceApi;
    policy: RetryPolicy;
    sink: ResultSink;
    standardNames: readonly string[];
    countReactions: boolean;
    signal?: AbortSignal;
}

export interface ReportResult {
    outputPath: string;
    periods: MonthPeriod[];
    records: UsageRecord[];
    stats: RunStatistics;
}

/** `out/usage.csv` -> `out/usage.partial.csv` */
export function partialPathFor(outputPath: string): string {
    const parsed = path.parse(outputPath);
    return path.join(parsed.dir, `${parsed.name}.partial${parsed.ext}`);
}

export class UsageReportWorkflow {
    constructor(private readonly deps: ReportDeps) {}

    async run(options: ReportOptions): Promise<ReportResult> {
        // everything that can be rejected is checked before the first request
        resolveSelection(options.filter);
        assertMaxEmojis(options.maxEmojis);
        const periods = buildMonthWindow(options.months, options.anchor ?? new Date());
        if (!options.outputPath.trim()) {
            throw new ConfigError("output path must not be empty");
        }

        logger.info("Starting emoji usage aggregation", {
            component: "UsageReportWorkflow",
            action: "run",
            months: periods.length,
            from: formatMonth(periods[0]),
            to: formatMonth(periods[periods.length - 1]),
            outputPath: options.outputPath,
        });

        await this.deps.sink.prepare(options.outputPath);

        const catalog = new EmojiCatalog({
            api: this.deps.api,
            policy: this.deps.policy,
            standardNames: this.deps.standardNames,
        });
        let emojis: Emoji[];
        try {
            await this.logWorkspace();
            emojis = await catalog.resolve({
                filter: options.filter,
                maxEmojis: options.maxEmojis,
            });
        } catch (e) {
            // nothing measured yet; an abort here is still an interrupt
            if (this.deps.signal?.aborted) {
                throw new AggregationAbortedError("interrupted", [], undefined, e);
            }
            throw e;
        }
        if (!emojis.length) {
            throw new ConfigError("No emoji matched the selected filters");
        }

        const aggregator = new Aggregator({
            probe: new UsageProbe({
                api: this.deps.api,
                policy: this.deps.policy,
                countReactions: this.deps.countReactions,
            }),
            signal: this.deps.signal,
        });

        let records: UsageRecord[];
        try {
            records = await aggregator.run(emojis, periods);
        } catch (e) {
            if (e instanceof AggregationAbortedError) {
                await this.flushPartial(e, options.outputPath);
            }
            throw e;
        }

        await this.deps.sink.write(records, options.outputPath);
        const stats = summarize(records);
        logStatistics(stats);

        return { outputPath: options.outputPath, periods, records, stats };
    }

    private async logWorkspace(): Promise<void> {
        try {
            const info = await this.deps.policy.execute("team.info", () =>
                this.deps.api.fetchWorkspaceInfo(),
            );
            logger.info("Workspace", {
                component: "UsageReportWorkflow",
                name: info.name ?? "Unknown",
                domain: info.domain,
            });
        } catch (e) {
            if (e instanceof AuthError || this.deps.signal?.aborted) throw e;
            logger.warn("Workspace info unavailable", {
                component: "UsageReportWorkflow",
                error: String(e),
            });
        }
    }

    private async flushPartial(
        aborted: AggregationAbortedError,
        outputPath: string,
    ): Promise<void> {
        if (!aborted.partial.length) return;
        const partialPath = partialPathFor(outputPath);
        try {
            await this.deps.sink.write(aborted.partial, partialPath);
            logger.warn("Partial results written", {
                component: "UsageReportWorkflow",
                action: "flushPartial",
                path: partialPath,
                records: aborted.collected,
            });
        } catch (writeError) {
            logger.error("Failed to write partial results", {
                component: "UsageReportWorkflow",
                action: "flushPartial",
                path: partialPath,
                error: String(writeError),
            });
        }
    }
}

function logStatistics(stats: RunStatistics): void {
    logger.info("Aggregation statistics", {
        component: "UsageReportWorkflow",
        records: stats.records,
        totalUsage: stats.totalUsage,
        nonZero: stats.nonZero,
        emojis: stats.emojis,
        months: stats.months,
    });
    stats.top.forEach((entry, i) => {
        logger.info(`  ${i + 1}. ${entry.emoji}: ${entry.usage} usages`, {
            component: "UsageReportWorkflow",
        });
    });
}
