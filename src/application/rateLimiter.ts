import { Clock } from "../domain/ports/clock.js";
import { RateLimiter } from "../domain/ports/rateLimiter.js";
import { ConfigError } from "../domain/errors.js";
import { systemClock } from "../util/time.js";
import { logger } from "../logger.js";

// 12 calls/minute; the search endpoint allows roughly 20.
export const DEFAULT_MIN_INTERVAL_MS = 5_000;

/**
 * Admits at most one call per `minIntervalMs`, measured from the start of the
 * previously admitted call. State lives for the process only.
 */
export class IntervalRateLimiter implements RateLimiter {
    private lastCallAt: number | null = null;

    constructor(
        readonly minIntervalMs: number = DEFAULT_MIN_INTERVAL_MS,
        private readonly clock: Clock = systemClock,
    ) {
        if (!Number.isFinite(minIntervalMs) || minIntervalMs <= 0) {
            throw new ConfigError(
                `min interval must be a positive number of ms (got ${minIntervalMs})`,
            );
        }
    }

    get lastAdmittedAt(): number | null {
        return this.lastCallAt;
    }

    async acquire(signal?: AbortSignal): Promise<void> {
        if (this.lastCallAt !== null) {
            let waitMs = this.lastCallAt + this.minIntervalMs - this.clock.now();
            if (waitMs > 0) {
                logger.debug("[Rate] Waiting for interval", {
                    component: "RateLimiter",
                    action: "acquire",
                    waitMs,
                });
            }
            // timers may fire slightly early; loop until the interval has really passed
            while (waitMs > 0) {
                await this.clock.sleep(waitMs, signal);
                waitMs = this.lastCallAt + this.minIntervalMs - this.clock.now();
            }
        }
        signal?.throwIfAborted();
        this.lastCallAt = this.clock.now();
    }
}
