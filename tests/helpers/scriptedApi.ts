import { vi } from "vitest";
import { WorkspaceApi } from "../../src/domain/ports/workspaceApi.js";
import { ManualClock } from "./manualClock.js";

/** WorkspaceApi stand-in that records the clock time of every call. */
export function makeApi(clock: ManualClock, custom: string[] = []) {
    const callTimes: number[] = [];
    const stamp = () => callTimes.push(clock.now());
    const api = {
        listCustomEmoji: vi.fn(async () => {
            stamp();
            return custom.map((name) => ({ name, value: `https://example.invalid/${name}.png` }));
        }),
        countMessages: vi.fn(async (query: string): Promise<number> => {
            stamp();
            return query.startsWith("has:") ? 1 : 2;
        }),
        fetchWorkspaceInfo: vi.fn(async () => {
            stamp();
            return { id: "T1", name: "Test Workspace", domain: "test" };
        }),
    } satisfies WorkspaceApi;
    return { api, callTimes };
}
