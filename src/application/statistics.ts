import { UsageRecord } from "../domain/models.js";

export interface RunStatistics {
    records: number;
    totalUsage: number;
    nonZero: number;
    emojis: number;
    months: number;
    top: { emoji: string; usage: number }[];
}

export function summarize(records: UsageRecord[], topN = 10): RunStatistics {
    const byEmoji = new Map<string, number>();
    const months = new Set<string>();
    let totalUsage = 0;
    let nonZero = 0;
    for (const r of records) {
        totalUsage += r.count;
        if (r.count > 0) nonZero++;
        byEmoji.set(r.emoji.name, (byEmoji.get(r.emoji.name) ?? 0) + r.count);
        months.add(`${r.period.year}-${r.period.month}`);
    }
    // stable sort keeps iteration order for ties
    const top = [...byEmoji.entries()]
        .map(([emoji, usage]) => ({ emoji, usage }))
        .sort((a, b) => b.usage - a.usage)
        .slice(0, topN);
    return {
        records: records.length,
        totalUsage,
        nonZero,
        emojis: byEmoji.size,
        months: months.size,
        top,
    };
}
