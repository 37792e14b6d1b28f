import crypto from "node:crypto";
export type Channel = "discord";
export interface Event {
    trace_id: string;
    channel: Channel;
    sender: {
        id: string;
        display: string;
        username: string;
        is_bot: boolean;
    };
    conversation: {
        thread_id: string;
    };
    message: {
        id: string;
        text: string;
    };
    received_at: string;
}
export function createEvent(base: Omit<Event, "trace_id" | "received_at">, receivedAt = new Date()): Event {
    return {
        ...base,
        trace_id: crypto.randomUUID(),
        received_at: receivedAt.toISOString(),
    };
}
