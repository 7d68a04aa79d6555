import path from "node:path";
import { access, copyFile, mkdir, stat, writeFile } from "node:fs/promises";
import { constants } from "node:fs";
import { UsageRecord } from "../../domain/models.js";
import { ConfigError } from "../../domain/errors.js";
import { ResultSink } from "../../domain/ports/resultSink.js";
import { formatMonth } from "../../application/monthWindow.js";
import { fileStamp } from "../../util/time.js";
import { logger } from "../../logger.js";

export const CSV_HEADER = ["emoji", "month", "usage_count"] as const;

function escapeField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

export function formatCsv(records: UsageRecord[]): string {
    const lines = [CSV_HEADER.join(",")];
    for (const r of records) {
        lines.push(
            [escapeField(r.emoji.name), formatMonth(r.period), String(r.count)].join(","),
        );
    }
    return lines.join("\n") + "\n";
}

export class CsvResultSink implements ResultSink {
    constructor(private readonly now: () => Date = () => new Date()) {}

    /** Ensures the directory is writable and backs up an existing file. */
    async prepare(outputPath: string): Promise<void> {
        const dir = path.dirname(path.resolve(outputPath));
        try {
            await mkdir(dir, { recursive: true });
            await access(dir, constants.W_OK);
        } catch (e) {
            throw new ConfigError(`Output directory ${dir} is not writable: ${String(e)}`);
        }

        if (!(await exists(outputPath))) return;
        const backupPath = `${outputPath}.backup_${fileStamp(this.now())}`;
        try {
            await copyFile(outputPath, backupPath);
            logger.info("Created backup", { component: "CsvResultSink", backupPath });
        } catch (e) {
            logger.warn("Failed to create backup", {
                component: "CsvResultSink",
                outputPath,
                error: String(e),
            });
        }
    }

    async write(records: UsageRecord[], outputPath: string): Promise<void> {
        await mkdir(path.dirname(path.resolve(outputPath)), { recursive: true });
        await writeFile(outputPath, formatCsv(records), "utf8");
        const { size } = await stat(outputPath);
        logger.info("CSV written", {
            component: "CsvResultSink",
            action: "write",
            outputPath,
            records: records.length,
            bytes: size,
        });
    }
}

async function exists(p: string): Promise<boolean> {
    try {
        await access(p);
        return true;
    } catch {
        return false;
    }
}
