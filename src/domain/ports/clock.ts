export interface Clock {
    now(): number; // epoch millis
    sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
