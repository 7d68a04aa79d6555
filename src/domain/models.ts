export type EmojiKind = "standard" | "custom";

export interface Emoji {
    name: string; // without surrounding colons
    kind: EmojiKind;
}

export interface MonthPeriod {
    year: number;
    month: number; // 1..12
}

export interface UsageRecord {
    emoji: Emoji;
    period: MonthPeriod;
    count: number;
}

export interface Cell {
    emoji: Emoji;
    period: MonthPeriod;
}
