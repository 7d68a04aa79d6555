import crypto from "node:crypto";

export function stableIdFor(obj: unknown): string {
    const json = JSON.stringify(obj);
    const h = crypto.createHash("sha256").update(json).digest("hex");
    return h.slice(0, 16);
}

/** Deterministic integer in [0, modulo) derived from the value's hash. */
export function stableBucket(obj: unknown, modulo: number): number {
    return parseInt(stableIdFor(obj).slice(0, 8), 16) % modulo;
}
