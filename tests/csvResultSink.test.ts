import { describe, it, expect, afterEach } from "vitest";
import path from "node:path";
import os from "node:os";
import { mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { CsvResultSink, formatCsv } from "../src/infra/csv/csvResultSink.js";
import { UsageRecord } from "../src/domain/models.js";

let tmpDir: string | null = null;

afterEach(async () => {
    if (tmpDir) {
        await rm(tmpDir, { recursive: true, force: true });
        tmpDir = null;
    }
});

const records: UsageRecord[] = [
    { emoji: { name: "+1", kind: "standard" }, period: { year: 2023, month: 12 }, count: 14 },
    { emoji: { name: "party,parrot", kind: "custom" }, period: { year: 2024, month: 1 }, count: 0 },
];

describe("formatCsv", () => {
    it("writes the header and quotes fields that need it", () => {
        expect(formatCsv(records)).toBe(
            'emoji,month,usage_count\n+1,2023-12,14\n"party,parrot",2024-01,0\n',
        );
    });

    it("writes only the header for no records", () => {
        expect(formatCsv([])).toBe("emoji,month,usage_count\n");
    });
});

describe("CsvResultSink", () => {
    it("creates missing directories and writes the file", async () => {
        tmpDir = await mkdtemp(path.join(os.tmpdir(), "csv-sink-"));
        const out = path.join(tmpDir, "a", "b", "usage.csv");
        const sink = new CsvResultSink();

        await sink.prepare(out);
        await sink.write(records.slice(0, 1), out);

        expect(await readFile(out, "utf8")).toBe("emoji,month,usage_count\n+1,2023-12,14\n");
    });

    it("backs up an existing output file with a timestamp suffix", async () => {
        tmpDir = await mkdtemp(path.join(os.tmpdir(), "csv-sink-"));
        const out = path.join(tmpDir, "usage.csv");
        await writeFile(out, "old\n", "utf8");
        const sink = new CsvResultSink(() => new Date(2024, 4, 6, 7, 8, 9));

        await sink.prepare(out);

        expect((await readdir(tmpDir)).sort()).toEqual([
            "usage.csv",
            "usage.csv.backup_20240506_070809",
        ]);
        expect(await readFile(`${out}.backup_20240506_070809`, "utf8")).toBe("old\n");
    });
});
