export interface RateLimiter {
    /**
     * Resolves once the next outbound call may start and records it as admitted.
     * Callers must serialize: at most one acquire() may be pending at a time.
     */
    acquire(signal?: AbortSignal): Promise<void>;
}
