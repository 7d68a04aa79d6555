import { Cell, UsageRecord } from "./models.js";

export class ConfigError extends Error {
    problems: string[];
    constructor(message: string, problems: string[] = []) {
        super(problems.length ? `${message}: ${problems.join("; ")}` : message);
        this.name = "ConfigError";
        this.problems = problems;
    }
}

export class AuthError extends Error {
    reason?: string; // platform error code, e.g. invalid_auth
    constructor(message: string, reason?: string, options?: ErrorOptions) {
        super(message, options);
        this.name = "AuthError";
        this.reason = reason;
    }
}

/** A single throttled (429-class) response. */
export class ThrottledError extends Error {
    retryAfterSec?: number;
    constructor(message = "Throttled", retryAfterSec?: number) {
        super(message);
        this.name = "ThrottledError";
        this.retryAfterSec = retryAfterSec;
    }
}

export class RateLimitExceededError extends Error {
    operation: string;
    attempts: number;
    lastWaitMs: number;
    constructor(operation: string, attempts: number, lastWaitMs: number) {
        super(
            `${operation}: still throttled after ${attempts} attempts (last advised wait ${Math.round(lastWaitMs / 1000)}s)`,
        );
        this.name = "RateLimitExceededError";
        this.operation = operation;
        this.attempts = attempts;
        this.lastWaitMs = lastWaitMs;
    }
}

export class TransientRequestError extends Error {
    status?: number;
    constructor(message: string, status?: number, options?: ErrorOptions) {
        super(message, options);
        this.name = "TransientRequestError";
        this.status = status;
    }
}

export type AbortReason = "failed" | "interrupted";

export class AggregationAbortedError extends Error {
    reason: AbortReason;
    cell?: Cell;
    partial: UsageRecord[];
    constructor(
        reason: AbortReason,
        partial: UsageRecord[],
        cell: Cell | undefined,
        cause: unknown,
    ) {
        const where = cell
            ? ` at :${cell.emoji.name}: (${cell.emoji.kind}) ${formatCellMonth(cell)}`
            : "";
        const detail = cause instanceof Error ? `: ${cause.message}` : "";
        super(
            `Aggregation ${reason}${where} after ${partial.length} records${detail}`,
            { cause },
        );
        this.name = "AggregationAbortedError";
        this.reason = reason;
        this.cell = cell;
        this.partial = partial;
    }

    get collected(): number {
        return this.partial.length;
    }
}

function formatCellMonth(cell: Cell): string {
    return `${cell.period.year}-${String(cell.period.month).padStart(2, "0")}`;
}
