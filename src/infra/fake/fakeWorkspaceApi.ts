import {
    CustomEmojiDefinition,
    WorkspaceApi,
    WorkspaceInfo,
} from "../../domain/ports/workspaceApi.js";
import { stableBucket } from "../../util/hash.js";
import { logger } from "../../logger.js";

const FAKE_CUSTOM = ["partyparrot", "shipit", "lgtm", "this-is-fine"];

/** Deterministic stand-in for dry runs: counts derive from a hash of the query. */
export class FakeWorkspaceApi implements WorkspaceApi {
    calls = 0;

    constructor(
        private readonly customNames: readonly string[] = FAKE_CUSTOM,
        private readonly maxCount = 50,
    ) {}

    async listCustomEmoji(): Promise<CustomEmojiDefinition[]> {
        this.calls++;
        return this.customNames.map((name) => ({
            name,
            value: `https://emoji.example.invalid/${name}.png`,
        }));
    }

    async countMessages(query: string): Promise<number> {
        this.calls++;
        const total = stableBucket(query, this.maxCount);
        logger.debug("[FAKE] search.messages", { query, total });
        return total;
    }

    async fetchWorkspaceInfo(): Promise<WorkspaceInfo> {
        this.calls++;
        return { id: "T00000000", name: "Fake Workspace", domain: "fake" };
    }
}
