import { UsageRecord } from "../models.js";

export interface ResultSink {
    prepare(path: string): Promise<void>;
    write(records: UsageRecord[], path: string): Promise<void>;
}
