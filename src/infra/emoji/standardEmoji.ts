import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

const DEFAULT_PATH = fileURLToPath(
    new URL("../../../data/standard-emoji.json", import.meta.url),
);

let cached: readonly string[] | null = null;

/** Standard shortcodes (without colons) in reference order. */
export function loadStandardEmojiNames(path?: string): readonly string[] {
    if (!path && cached) return cached;
    const raw: unknown = JSON.parse(readFileSync(path ?? DEFAULT_PATH, "utf8"));
    if (!Array.isArray(raw) || !raw.every((n): n is string => typeof n === "string")) {
        throw new Error(`Standard emoji list at ${path ?? DEFAULT_PATH} is not a string array`);
    }
    const names = Object.freeze([...new Set(raw)]);
    if (!path) cached = names;
    return names;
}
