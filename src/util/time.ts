import { setTimeout as delay } from "node:timers/promises";
import { Clock } from "../domain/ports/clock.js";

export function toIso(ts?: number | null): string | undefined {
    if (ts === undefined || ts === null) return undefined;
    const ms = ts < 1e12 ? ts * 1000 : ts;
    const date = new Date(ms);
    if (Number.isNaN(date.getTime())) return undefined;
    return date.toISOString();
}

export const systemClock: Clock = {
    now: () => Date.now(),
    sleep: async (ms, signal) => {
        if (ms <= 0) {
            signal?.throwIfAborted();
            return;
        }
        await delay(ms, undefined, { signal });
    },
};

/** YYYYMMDD_HHMMSS in local time, for backup file suffixes. */
export function fileStamp(date = new Date()): string {
    const p = (n: number) => String(n).padStart(2, "0");
    return (
        `${date.getFullYear()}${p(date.getMonth() + 1)}${p(date.getDate())}_` +
        `${p(date.getHours())}${p(date.getMinutes())}${p(date.getSeconds())}`
    );
}
