export interface BackoffOptions {
    baseSec: number;
    capSec: number;
}

export const DEFAULT_BACKOFF: BackoffOptions = { baseSec: 2, capSec: 300 };

/** Wait before retrying a throttled call that carried no Retry-After. */
export function computeBackoffSeconds(
    attempt: number,
    options: BackoffOptions = DEFAULT_BACKOFF,
): number {
    // 2s,4s,8s,... capped at 5m
    const base = Math.pow(2, Math.max(0, attempt - 1)) * options.baseSec;
    return Math.min(options.capSec, base);
}
