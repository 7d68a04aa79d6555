import { ErrorCode, LogLevel, WebClient } from "@slack/web-api";
import {
    AuthError,
    ThrottledError,
    TransientRequestError,
} from "../../domain/errors.js";
import {
    CustomEmojiDefinition,
    WorkspaceApi,
    WorkspaceInfo,
} from "../../domain/ports/workspaceApi.js";

// Platform error codes that mean the credential itself is unusable.
const AUTH_ERRORS = new Set([
    "invalid_auth",
    "not_authed",
    "account_inactive",
    "token_revoked",
    "token_expired",
    "no_permission",
    "missing_scope",
    "not_allowed_token_type",
]);

export class SlackWorkspaceApi implements WorkspaceApi {
    private readonly client: WebClient;

    constructor(token: string, client?: WebClient) {
        this.client =
            client ??
            new WebClient(token, {
                // 429s must reach RetryPolicy instead of being retried inside the SDK
                rejectRateLimitedCalls: true,
                retryConfig: { retries: 0 },
                logLevel: LogLevel.ERROR,
            });
    }

    async listCustomEmoji(): Promise<CustomEmojiDefinition[]> {
        const res = await this.call("emoji.list", () => this.client.emoji.list({}));
        return Object.entries(res.emoji ?? {}).map(([name, value]) => ({
            name,
            value,
        }));
    }

    async countMessages(query: string): Promise<number> {
        const res = await this.call("search.messages", () =>
            this.client.search.messages({ query, count: 1 }),
        );
        return res.messages?.total ?? 0;
    }

    async fetchWorkspaceInfo(): Promise<WorkspaceInfo> {
        const res = await this.call("team.info", () => this.client.team.info({}));
        return {
            id: res.team?.id,
            name: res.team?.name,
            domain: res.team?.domain,
        };
    }

    private async call<T>(method: string, fn: () => Promise<T>): Promise<T> {
        try {
            return await fn();
        } catch (e) {
            throw toDomainError(e, method);
        }
    }
}

export function toDomainError(e: unknown, method: string): Error {
    if (e instanceof Error && "code" in e) {
        switch (e.code) {
            case ErrorCode.RateLimitedError: {
                const retryAfter =
                    "retryAfter" in e && typeof e.retryAfter === "number"
                        ? e.retryAfter
                        : undefined;
                return new ThrottledError(`${method} rate limited`, retryAfter);
            }
            case ErrorCode.PlatformError: {
                const code = platformCode(e) ?? "unknown_error";
                if (code === "ratelimited" || code === "rate_limited") {
                    return new ThrottledError(`${method} rate limited (${code})`);
                }
                if (AUTH_ERRORS.has(code)) {
                    return new AuthError(`${method} rejected the token: ${code}`, code, {
                        cause: e,
                    });
                }
                return new TransientRequestError(`${method} failed: ${code}`, undefined, {
                    cause: e,
                });
            }
            case ErrorCode.HTTPError: {
                const status =
                    "statusCode" in e && typeof e.statusCode === "number"
                        ? e.statusCode
                        : undefined;
                if (status === 429) {
                    return new ThrottledError(
                        `${method} rate limited (HTTP 429)`,
                        retryAfterHeader(e),
                    );
                }
                if (status === 401 || status === 403) {
                    return new AuthError(`${method} rejected the token: HTTP ${status}`, undefined, {
                        cause: e,
                    });
                }
                return new TransientRequestError(
                    `${method} failed: HTTP ${status ?? "?"}`,
                    status,
                    { cause: e },
                );
            }
        }
    }
    const message = e instanceof Error ? e.message : String(e);
    return new TransientRequestError(`${method} failed: ${message}`, undefined, {
        cause: e,
    });
}

function platformCode(e: Error): string | undefined {
    const data: unknown = "data" in e ? e.data : undefined;
    if (typeof data === "object" && data !== null && "error" in data) {
        return typeof data.error === "string" ? data.error : undefined;
    }
    return undefined;
}

function retryAfterHeader(e: Error): number | undefined {
    const headers: unknown = "headers" in e ? e.headers : undefined;
    if (typeof headers !== "object" || headers === null || !("retry-after" in headers)) {
        return undefined;
    }
    const raw = Number(headers["retry-after"]);
    return Number.isFinite(raw) && raw >= 0 ? raw : undefined;
}
