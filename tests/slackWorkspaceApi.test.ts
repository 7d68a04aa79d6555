import { describe, it, expect, vi } from "vitest";
import { ErrorCode, WebClient } from "@slack/web-api";
import { SlackWorkspaceApi, toDomainError } from "../src/infra/slack/slackWorkspaceApi.js";
import { AuthError, ThrottledError, TransientRequestError } from "../src/domain/errors.js";

function sdkError(fields: Record<string, unknown>): Error {
    return Object.assign(new Error("sdk failure"), fields);
}

describe("toDomainError", () => {
    it("maps rate-limited SDK errors with their Retry-After", () => {
        const err = toDomainError(sdkError({ code: ErrorCode.RateLimitedError, retryAfter: 30 }), "search.messages");
        expect(err).toBeInstanceOf(ThrottledError);
        expect(err).toMatchObject({ retryAfterSec: 30 });
    });

    it("maps an HTTP 429 and reads the retry-after header", () => {
        const err = toDomainError(
            sdkError({ code: ErrorCode.HTTPError, statusCode: 429, headers: { "retry-after": "12" } }),
            "search.messages",
        );
        expect(err).toBeInstanceOf(ThrottledError);
        expect(err).toMatchObject({ retryAfterSec: 12 });
    });

    it("maps the ratelimited platform error without an advisory wait", () => {
        const err = toDomainError(
            sdkError({ code: ErrorCode.PlatformError, data: { ok: false, error: "ratelimited" } }),
            "emoji.list",
        );
        expect(err).toBeInstanceOf(ThrottledError);
        expect(err).toMatchObject({ retryAfterSec: undefined });
    });

    it.each(["invalid_auth", "not_authed", "token_revoked", "missing_scope"])(
        "maps platform error %s to AuthError",
        (code) => {
            const err = toDomainError(
                sdkError({ code: ErrorCode.PlatformError, data: { ok: false, error: code } }),
                "team.info",
            );
            expect(err).toBeInstanceOf(AuthError);
            expect(err).toMatchObject({ reason: code });
        },
    );

    it("maps HTTP 401 to AuthError", () => {
        const err = toDomainError(sdkError({ code: ErrorCode.HTTPError, statusCode: 401 }), "team.info");
        expect(err).toBeInstanceOf(AuthError);
    });

    it("maps other failures to TransientRequestError", () => {
        const http = toDomainError(sdkError({ code: ErrorCode.HTTPError, statusCode: 502 }), "search.messages");
        expect(http).toBeInstanceOf(TransientRequestError);
        expect(http).toMatchObject({ status: 502, message: "search.messages failed: HTTP 502" });

        const platform = toDomainError(
            sdkError({ code: ErrorCode.PlatformError, data: { ok: false, error: "invalid_arguments" } }),
            "search.messages",
        );
        expect(platform).toBeInstanceOf(TransientRequestError);
        expect(platform.message).toBe("search.messages failed: invalid_arguments");

        const network = toDomainError(new Error("ECONNRESET"), "search.messages");
        expect(network).toBeInstanceOf(TransientRequestError);
        expect(network.message).toBe("search.messages failed: ECONNRESET");
    });
});

describe("SlackWorkspaceApi", () => {
    it("reads the search total with a single-result page", async () => {
        const client = new WebClient("test-token");
        const search = vi
            .spyOn(client.search, "messages")
            .mockResolvedValue({ ok: true, messages: { total: 42 } });
        const api = new SlackWorkspaceApi("test-token", client);

        await expect(api.countMessages(":smile: after:2024-03-31 before:2024-05-01")).resolves.toBe(42);
        expect(search).toHaveBeenCalledWith({
            query: ":smile: after:2024-03-31 before:2024-05-01",
            count: 1,
        });
    });

    it("treats a missing total as zero", async () => {
        const client = new WebClient("test-token");
        vi.spyOn(client.search, "messages").mockResolvedValue({ ok: true });

        await expect(new SlackWorkspaceApi("test-token", client).countMessages("q")).resolves.toBe(0);
    });

    it("lists custom emoji in response order", async () => {
        const client = new WebClient("test-token");
        vi.spyOn(client.emoji, "list").mockResolvedValue({
            ok: true,
            emoji: { partyparrot: "https://example.invalid/p.gif", shipit: "alias:squirrel" },
        });

        const defs = await new SlackWorkspaceApi("test-token", client).listCustomEmoji();

        expect(defs).toEqual([
            { name: "partyparrot", value: "https://example.invalid/p.gif" },
            { name: "shipit", value: "alias:squirrel" },
        ]);
    });

    it("returns workspace info", async () => {
        const client = new WebClient("test-token");
        vi.spyOn(client.team, "info").mockResolvedValue({
            ok: true,
            team: { id: "T123", name: "Acme", domain: "acme" },
        });

        await expect(new SlackWorkspaceApi("test-token", client).fetchWorkspaceInfo()).resolves.toEqual({
            id: "T123",
            name: "Acme",
            domain: "acme",
        });
    });

    it("translates SDK rejections", async () => {
        const client = new WebClient("test-token");
        vi.spyOn(client.search, "messages").mockRejectedValue(
            sdkError({ code: ErrorCode.RateLimitedError, retryAfter: 5 }),
        );

        await expect(new SlackWorkspaceApi("test-token", client).countMessages("q")).rejects.toMatchObject({
            name: "ThrottledError",
            retryAfterSec: 5,
        });
    });
});
