import { describe, it, expect } from "vitest";
import { UsageProbe } from "../src/application/usageProbe.js";
import { IntervalRateLimiter } from "../src/application/rateLimiter.js";
import { RetryPolicy } from "../src/application/retryPolicy.js";
import { AuthError, RateLimitExceededError, ThrottledError } from "../src/domain/errors.js";
import { Emoji } from "../src/domain/models.js";
import { ManualClock } from "./helpers/manualClock.js";
import { makeApi } from "./helpers/scriptedApi.js";

const smile: Emoji = { name: "smile", kind: "standard" };
const april = { year: 2024, month: 4 };

function setup(countReactions = true, maxRetry = 3) {
    const clock = new ManualClock();
    const { api } = makeApi(clock);
    const policy = new RetryPolicy(new IntervalRateLimiter(5_000, clock), { clock, maxRetry });
    const probe = new UsageProbe({ api, policy, countReactions });
    return { clock, api, probe };
}

describe("UsageProbe", () => {
    it("sums message and reaction totals for the cell", async () => {
        const { api, probe } = setup();

        const record = await probe.measure(smile, april);

        expect(record).toEqual({ emoji: smile, period: april, count: 3 });
        expect(api.countMessages.mock.calls).toEqual([
            [":smile: after:2024-03-31 before:2024-05-01"],
            ["has::smile: after:2024-03-31 before:2024-05-01"],
        ]);
    });

    it("issues only the text query when reactions are off", async () => {
        const { api, probe } = setup(false);

        const record = await probe.measure(smile, april);

        expect(record.count).toBe(2);
        expect(api.countMessages).toHaveBeenCalledTimes(1);
    });

    it("clamps odd totals to non-negative integers", async () => {
        const { api, probe } = setup();
        api.countMessages.mockResolvedValueOnce(-4).mockResolvedValueOnce(2.7);

        const record = await probe.measure(smile, april);

        expect(record.count).toBe(2);
    });

    it("propagates retry policy failures unchanged", async () => {
        const { api, probe } = setup();
        const err = new AuthError("rejected", "invalid_auth");
        api.countMessages.mockRejectedValueOnce(err);

        await expect(probe.measure(smile, april)).rejects.toBe(err);
        expect(api.countMessages).toHaveBeenCalledTimes(1);
    });

    it("gives up on a cell after the retry budget", async () => {
        const { api, probe } = setup(true, 2);
        api.countMessages.mockRejectedValue(new ThrottledError("429", 1));

        await expect(probe.measure(smile, april)).rejects.toThrow(RateLimitExceededError);
        expect(api.countMessages).toHaveBeenCalledTimes(3);
    });
});
