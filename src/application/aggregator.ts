import { Cell, Emoji, MonthPeriod, UsageRecord } from "../domain/models.js";
import { AggregationAbortedError } from "../domain/errors.js";
import { UsageProbe } from "./usageProbe.js";
import { formatMonth } from "./monthWindow.js";
import { logger } from "../logger.js";

export interface AggregatorDeps {
    probe: Pick<UsageProbe, "measure">;
    signal?: AbortSignal;
    progressEvery?: number;
}

/**
 * Walks emoji (outer) × month (inner), one probe at a time. Any failure stops
 * the run with AggregationAbortedError carrying what was collected.
 */
export class Aggregator {
    constructor(private readonly deps: AggregatorDeps) {}

    async run(emojis: Emoji[], periods: MonthPeriod[]): Promise<UsageRecord[]> {
        const records: UsageRecord[] = [];
        const total = emojis.length * periods.length;
        const every = this.deps.progressEvery ?? 10;

        logger.info("Aggregation started", {
            component: "Aggregator",
            action: "run",
            emojis: emojis.length,
            months: periods.length,
            cells: total,
        });

        for (const [i, emoji] of emojis.entries()) {
            logger.info(`Processing emoji ${i + 1}/${emojis.length}: ${emoji.name}`, {
                component: "Aggregator",
                action: "run",
                emoji: emoji.name,
                kind: emoji.kind,
            });
            let emojiTotal = 0;
            for (const period of periods) {
                const cell: Cell = { emoji, period };
                if (this.deps.signal?.aborted) {
                    throw new AggregationAbortedError(
                        "interrupted",
                        records,
                        cell,
                        this.deps.signal.reason,
                    );
                }
                let record: UsageRecord;
                try {
                    record = await this.deps.probe.measure(emoji, period);
                } catch (e) {
                    const reason = this.deps.signal?.aborted ? "interrupted" : "failed";
                    throw new AggregationAbortedError(reason, records, cell, e);
                }
                records.push(record);
                emojiTotal += record.count;

                if (records.length % every === 0 || records.length === total) {
                    logger.info("Progress", {
                        component: "Aggregator",
                        action: "run",
                        done: records.length,
                        total,
                        percent: Number(((records.length / total) * 100).toFixed(1)),
                        lastMonth: formatMonth(period),
                    });
                }
            }
            logger.info("Emoji done", {
                component: "Aggregator",
                action: "run",
                emoji: emoji.name,
                usage: emojiTotal,
            });
        }

        return records;
    }
}
