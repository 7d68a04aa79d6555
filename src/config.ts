import dotenv from "dotenv";
import { ConfigError } from "./domain/errors.js";
import { LogLevel, isLogLevel } from "./logger.js";

dotenv.config();

type Env = Record<string, string | undefined>;

function num(env: Env, name: string, def: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") return def;
    return Number(raw);
}

function bool(env: Env, name: string, def: boolean): boolean {
    const raw = env[name];
    if (!raw) return def;
    return raw.toLowerCase() === "true";
}

export interface Config {
    slackToken: string;
    minIntervalSec: number;
    maxRetry: number;
    months: number;
    outputPath: string;
    logLevel: string;
    countReactions: boolean;
    useFakeApi: boolean;
}

export function loadConfig(env: Env = process.env): Config {
    return {
        slackToken: env.SLACK_TOKEN || "",
        minIntervalSec: num(env, "MIN_INTERVAL_SEC", 5.0),
        maxRetry: num(env, "MAX_RETRY", 3),
        months: num(env, "MONTHS", 12),
        outputPath: env.OUTPUT_PATH || "emoji_usage.csv",
        logLevel: (env.LOG_LEVEL || "info").toLowerCase(),
        countReactions: bool(env, "COUNT_REACTIONS", true),
        useFakeApi: bool(env, "USE_FAKE_API", false),
    };
}

export const config: Config = loadConfig();

export function validateConfig(cfg: Config): asserts cfg is Config & {
    logLevel: LogLevel;
} {
    const problems: string[] = [];
    if (!cfg.useFakeApi && !cfg.slackToken) problems.push("SLACK_TOKEN is required");
    if (!Number.isFinite(cfg.minIntervalSec) || cfg.minIntervalSec <= 0)
        problems.push("MIN_INTERVAL_SEC must be a positive number");
    if (!Number.isInteger(cfg.maxRetry) || cfg.maxRetry < 0)
        problems.push("MAX_RETRY must be a non-negative integer");
    if (!Number.isInteger(cfg.months) || cfg.months < 1)
        problems.push("MONTHS must be a positive integer");
    if (!cfg.outputPath.trim()) problems.push("OUTPUT_PATH must not be empty");
    if (!isLogLevel(cfg.logLevel))
        problems.push(`LOG_LEVEL must be one of debug, info, warn, error`);
    if (problems.length) {
        throw new ConfigError("Invalid configuration", problems);
    }
}
