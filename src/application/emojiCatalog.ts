import { Emoji } from "../domain/models.js";
import { ConfigError } from "../domain/errors.js";
import { WorkspaceApi } from "../domain/ports/workspaceApi.js";
import { RetryPolicy } from "./retryPolicy.js";
import { logger } from "../logger.js";

export interface EmojiFilter {
    onlyStandard?: boolean;
    onlyCustom?: boolean;
    noStandard?: boolean;
    noCustom?: boolean;
}

export interface EmojiSelection {
    standard: boolean;
    custom: boolean;
}

/** Throws ConfigError for contradictory flags; never touches the network. */
export function resolveSelection(filter: EmojiFilter): EmojiSelection {
    const { onlyStandard, onlyCustom, noStandard, noCustom } = filter;
    if (onlyStandard && onlyCustom) {
        throw new ConfigError("--only-standard and --only-custom cannot be combined");
    }
    if ((onlyStandard || onlyCustom) && (noStandard || noCustom)) {
        throw new ConfigError(
            `--only-${onlyStandard ? "standard" : "custom"} cannot be combined with --no-standard/--no-custom`,
        );
    }
    if (noStandard && noCustom) {
        throw new ConfigError("--no-standard and --no-custom would exclude every emoji");
    }
    if (onlyStandard) return { standard: true, custom: false };
    if (onlyCustom) return { standard: false, custom: true };
    return { standard: !noStandard, custom: !noCustom };
}

export function assertMaxEmojis(maxEmojis: number | undefined): void {
    if (maxEmojis === undefined) return;
    if (!Number.isInteger(maxEmojis) || maxEmojis < 1) {
        throw new ConfigError(`max emojis must be a positive integer (got ${maxEmojis})`);
    }
}

export interface CatalogOptions {
    filter: EmojiFilter;
    maxEmojis?: number;
}

export interface CatalogDeps {
    api: WorkspaceApi;
    policy: RetryPolicy;
    standardNames: readonly string[];
}

/**
 * Working set: standard emoji first, then custom, each in reference/fetch
 * order. A custom emoji replaces a standard one with the same name.
 */
export class EmojiCatalog {
    constructor(private readonly deps: CatalogDeps) {}

    async resolve(options: CatalogOptions): Promise<Emoji[]> {
        const selection = resolveSelection(options.filter);
        assertMaxEmojis(options.maxEmojis);

        const custom = selection.custom ? await this.fetchCustomNames() : [];
        const customSet = new Set(custom);

        const standard = selection.standard
            ? validNames(this.deps.standardNames, "standard")
            : [];
        const shadowed = standard.filter((name) => customSet.has(name));
        if (shadowed.length) {
            logger.info("Custom emoji override standard names", {
                component: "EmojiCatalog",
                action: "resolve",
                names: shadowed,
            });
        }

        const working: Emoji[] = [
            ...standard
                .filter((name) => !customSet.has(name))
                .map((name): Emoji => ({ name, kind: "standard" })),
            ...custom.map((name): Emoji => ({ name, kind: "custom" })),
        ];

        if (options.maxEmojis !== undefined && working.length > options.maxEmojis) {
            logger.info("Emoji list truncated", {
                component: "EmojiCatalog",
                action: "resolve",
                from: working.length,
                to: options.maxEmojis,
            });
            return working.slice(0, options.maxEmojis);
        }

        logger.info("Emoji set resolved", {
            component: "EmojiCatalog",
            action: "resolve",
            standard: working.filter((e) => e.kind === "standard").length,
            custom: custom.length,
        });
        return working;
    }

    private async fetchCustomNames(): Promise<string[]> {
        const defs = await this.deps.policy.execute("emoji.list", () =>
            this.deps.api.listCustomEmoji(),
        );
        return validNames(
            defs.map((d) => d.name),
            "custom",
        );
    }
}

function validNames(names: readonly string[], kind: Emoji["kind"]): string[] {
    const seen = new Set<string>();
    const out: string[] = [];
    for (const name of names) {
        if (!name || /\s/.test(name)) {
            logger.warn("Skipping emoji with invalid name", {
                component: "EmojiCatalog",
                kind,
                name,
            });
            continue;
        }
        if (seen.has(name)) continue;
        seen.add(name);
        out.push(name);
    }
    return out;
}
