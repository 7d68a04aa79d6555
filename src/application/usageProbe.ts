import { Emoji, MonthPeriod, UsageRecord } from "../domain/models.js";
import { WorkspaceApi } from "../domain/ports/workspaceApi.js";
import { RetryPolicy } from "./retryPolicy.js";
import { buildUsageQueries } from "./queryBuilder.js";
import { formatMonth } from "./monthWindow.js";
import { logger } from "../logger.js";

export interface UsageProbeDeps {
    api: WorkspaceApi;
    policy: RetryPolicy;
    countReactions: boolean;
}

/**
 * Measures one cell from search totals: messages containing the emoji plus,
 * when enabled, messages carrying it as a reaction.
 */
export class UsageProbe {
    constructor(private readonly deps: UsageProbeDeps) {}

    async measure(emoji: Emoji, period: MonthPeriod): Promise<UsageRecord> {
        const queries = buildUsageQueries(emoji, period);
        const month = formatMonth(period);

        const text = await this.search(`search.messages ${month} :${emoji.name}:`, queries.text);
        const reactions = this.deps.countReactions
            ? await this.search(`search.messages ${month} has::${emoji.name}:`, queries.reactions)
            : 0;

        const count = text + reactions;
        logger.debug("Cell measured", {
            component: "UsageProbe",
            action: "measure",
            emoji: emoji.name,
            kind: emoji.kind,
            month,
            text,
            reactions,
            count,
        });
        return { emoji, period, count };
    }

    private async search(label: string, query: string): Promise<number> {
        const total = await this.deps.policy.execute(label, () =>
            this.deps.api.countMessages(query),
        );
        return toCount(total);
    }
}

function toCount(total: number): number {
    return Number.isFinite(total) && total > 0 ? Math.floor(total) : 0;
}
