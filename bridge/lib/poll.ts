import { setTimeout as delay } from "node:timers/promises";

export interface PollOptions {
    timeoutMs: number;
    intervalMs: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Calls `probe` every `intervalMs` until it yields a non-null value or the
 * deadline passes. Returns null on deadline; the probe always runs at least once.
 */
export async function pollUntil<T>(probe: () => Promise<T | null>, options: PollOptions): Promise<T | null> {
    const now = options.now ?? Date.now;
    const sleep = options.sleep ?? defaultSleep;
    const deadline = now() + Math.max(0, options.timeoutMs);
    const intervalMs = Math.max(1, Math.floor(options.intervalMs));

    for (;;) {
        const result = await probe();
        if (result !== null) return result;
        const remaining = deadline - now();
        if (remaining <= 0) return null;
        await sleep(Math.min(intervalMs, remaining));
    }
}

export function defaultSleep(ms: number): Promise<void> {
    return delay(ms);
}
