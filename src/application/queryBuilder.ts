import { Emoji, MonthPeriod } from "../domain/models.js";
import { dateRangeOf, dayBefore } from "./monthWindow.js";

export interface UsageQueries {
    text: string;
    reactions: string;
}

// Search `after:` and `before:` are both exclusive, so the range is opened one day early.
export function buildUsageQueries(emoji: Emoji, period: MonthPeriod): UsageQueries {
    const range = `after:${dayBefore(period)} before:${dateRangeOf(period).next}`;
    const marker = `:${emoji.name}:`;
    return {
        text: `${marker} ${range}`,
        reactions: `has:${marker} ${range}`,
    };
}
