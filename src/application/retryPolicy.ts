import { Clock } from "../domain/ports/clock.js";
import { RateLimiter } from "../domain/ports/rateLimiter.js";
import {
    AuthError,
    ConfigError,
    RateLimitExceededError,
    ThrottledError,
    TransientRequestError,
} from "../domain/errors.js";
import { BackoffOptions, DEFAULT_BACKOFF, computeBackoffSeconds } from "./backoff.js";
import { systemClock, toIso } from "../util/time.js";
import { logger } from "../logger.js";

export const DEFAULT_MAX_RETRY = 3;

export type FailureKind = "rate_limit_exceeded" | "auth" | "transient";

export type RetryState<T> =
    | { kind: "pending"; attempt: number }
    | { kind: "waiting_for_quota"; attempt: number }
    | {
          kind: "waiting_for_retry_after";
          attempt: number;
          waitMs: number;
          source: "server" | "backoff";
      }
    | { kind: "succeeded"; attempt: number; value: T }
    | { kind: "failed"; attempt: number; failure: FailureKind; error: Error };

export type RetryObserver = (state: RetryState<unknown>) => void;

export interface RetryPolicyOptions {
    maxRetry?: number;
    backoff?: BackoffOptions;
    clock?: Clock;
    signal?: AbortSignal;
}

/**
 * Runs one logical call through the limiter, retrying only throttled
 * responses. A call gets at most `maxRetry + 1` attempts.
 */
export class RetryPolicy {
    readonly maxRetry: number;
    private readonly backoff: BackoffOptions;
    private readonly clock: Clock;
    private readonly signal?: AbortSignal;

    constructor(
        private readonly limiter: RateLimiter,
        options: RetryPolicyOptions = {},
    ) {
        this.maxRetry = options.maxRetry ?? DEFAULT_MAX_RETRY;
        if (!Number.isInteger(this.maxRetry) || this.maxRetry < 0) {
            throw new ConfigError(
                `max retry must be a non-negative integer (got ${this.maxRetry})`,
            );
        }
        this.backoff = options.backoff ?? DEFAULT_BACKOFF;
        this.clock = options.clock ?? systemClock;
        this.signal = options.signal;
    }

    async execute<T>(
        label: string,
        call: () => Promise<T>,
        observe?: RetryObserver,
    ): Promise<T> {
        let state: RetryState<T> = { kind: "pending", attempt: 1 };
        for (;;) {
            observe?.(state);
            switch (state.kind) {
                case "pending":
                    state = { kind: "waiting_for_quota", attempt: state.attempt };
                    break;
                case "waiting_for_quota": {
                    const attempt: number = state.attempt;
                    await this.limiter.acquire(this.signal);
                    try {
                        const value = await call();
                        state = { kind: "succeeded", attempt, value };
                    } catch (e) {
                        state = this.onFailure<T>(label, attempt, e);
                    }
                    break;
                }
                case "waiting_for_retry_after":
                    await this.clock.sleep(state.waitMs, this.signal);
                    state = { kind: "waiting_for_quota", attempt: state.attempt + 1 };
                    break;
                case "succeeded":
                    return state.value;
                case "failed":
                    throw state.error;
            }
        }
    }

    private onFailure<T>(label: string, attempt: number, e: unknown): RetryState<T> {
        if (e instanceof ThrottledError) {
            const fromServer = e.retryAfterSec !== undefined;
            const waitMs = fromServer
                ? Math.max(0, (e.retryAfterSec ?? 0) * 1000)
                : computeBackoffSeconds(attempt, this.backoff) * 1000;

            if (attempt > this.maxRetry) {
                logger.error("[Rate] Retry budget exhausted", {
                    component: "RetryPolicy",
                    action: "execute",
                    operation: label,
                    attempts: attempt,
                    lastWaitMs: waitMs,
                });
                return {
                    kind: "failed",
                    attempt,
                    failure: "rate_limit_exceeded",
                    error: new RateLimitExceededError(label, attempt, waitMs),
                };
            }

            logger.warn("[Rate] Throttled; waiting before retry", {
                component: "RetryPolicy",
                action: "execute",
                operation: label,
                attempt,
                maxAttempts: this.maxRetry + 1,
                waitSec: waitMs / 1000,
                source: fromServer ? "retry-after" : "backoff",
                resumeAtIso: toIso(this.clock.now() + waitMs),
            });
            return {
                kind: "waiting_for_retry_after",
                attempt,
                waitMs,
                source: fromServer ? "server" : "backoff",
            };
        }

        if (e instanceof AuthError) {
            return { kind: "failed", attempt, failure: "auth", error: e };
        }

        const error =
            e instanceof Error
                ? e
                : new TransientRequestError(`${label}: ${String(e)}`, undefined, {
                      cause: e,
                  });
        return { kind: "failed", attempt, failure: "transient", error };
    }
}
