import { MonthPeriod } from "../domain/models.js";
import { ConfigError } from "../domain/errors.js";

export function monthOf(date: Date): MonthPeriod {
    return { year: date.getFullYear(), month: date.getMonth() + 1 };
}

export function shiftMonth(period: MonthPeriod, delta: number): MonthPeriod {
    const index = period.year * 12 + (period.month - 1) + delta;
    return { year: Math.floor(index / 12), month: (index % 12) + 1 };
}

/** `YYYY-MM`, the month column of the report. */
export function formatMonth(period: MonthPeriod): string {
    return `${period.year}-${String(period.month).padStart(2, "0")}`;
}

export function assertWindowLength(months: number): void {
    if (!Number.isInteger(months) || months < 1) {
        throw new ConfigError(`months must be a positive integer (got ${months})`);
    }
}

/**
 * The `months` calendar months ending with the anchor's month, oldest first.
 * The anchor is read in local time.
 */
export function buildMonthWindow(months: number, anchor: Date = new Date()): MonthPeriod[] {
    assertWindowLength(months);
    const current = monthOf(anchor);
    const periods: MonthPeriod[] = [];
    for (let back = months - 1; back >= 0; back--) {
        periods.push(shiftMonth(current, -back));
    }
    return periods;
}

export interface DateRange {
    first: string; // YYYY-MM-DD, inclusive
    next: string; // first day of the following month, exclusive
}

export function dateRangeOf(period: MonthPeriod): DateRange {
    return {
        first: `${formatMonth(period)}-01`,
        next: `${formatMonth(shiftMonth(period, 1))}-01`,
    };
}

/** Last calendar day of the month before `period`, as YYYY-MM-DD. */
export function dayBefore(period: MonthPeriod): string {
    const prev = shiftMonth(period, -1);
    // day 0 of a month is the last day of the previous one
    const lastDay = new Date(Date.UTC(period.year, period.month - 1, 0)).getUTCDate();
    return `${formatMonth(prev)}-${String(lastDay).padStart(2, "0")}`;
}
