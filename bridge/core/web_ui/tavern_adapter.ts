import { BridgeError } from "../../lib/errors";
import { defaultSleep, pollUntil } from "../../lib/poll";
import { MESSAGE_INPUT } from "./selectors";
import type { ChatMessageSnapshot, TavernPage, WebUiAdapter } from "./types";

export interface TavernAdapterOptions {
    pollIntervalMs?: number;
    characterSettleMs?: number;
    personaSettleMs?: number;
    /** Upper bound on waiting for an earlier generation to finish before a submit. */
    idleTimeoutMs?: number;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Drives the chat page like a user would. Replies are matched against a
 * marker (the id of the newest message seen before the last submit), so
 * calls must not interleave; the bridge serializes them.
 */
export class TavernWebUiAdapter implements WebUiAdapter {
    private readonly page: TavernPage;
    private readonly pollIntervalMs: number;
    private readonly characterSettleMs: number;
    private readonly personaSettleMs: number;
    private readonly idleTimeoutMs: number;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private lastMarker: string | null = null;

    constructor(page: TavernPage, options: TavernAdapterOptions = {}) {
        this.page = page;
        this.pollIntervalMs = Math.max(1, Math.floor(options.pollIntervalMs ?? 500));
        this.characterSettleMs = Math.max(0, Math.floor(options.characterSettleMs ?? 2_000));
        this.personaSettleMs = Math.max(0, Math.floor(options.personaSettleMs ?? 500));
        this.idleTimeoutMs = Math.max(0, Math.floor(options.idleTimeoutMs ?? 30_000));
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? defaultSleep;
    }

    get marker(): string | null {
        return this.lastMarker;
    }

    async submit(text: string): Promise<void> {
        await this.requireInput();
        // a reply abandoned after a timeout may still be streaming; it must land before the marker
        await this.waitUntilIdle();
        await this.refreshMarker();
        await this.page.typeAndSend(text);
    }

    async awaitResponse(timeoutSeconds: number): Promise<string> {
        const reply = await pollUntil(() => this.findNewReply(), {
            timeoutMs: timeoutSeconds * 1000,
            intervalMs: this.pollIntervalMs,
            now: this.now,
            sleep: this.sleep,
        });
        if (!reply) {
            throw new BridgeError("TIMEOUT", `No reply from the web UI within ${timeoutSeconds}s.`);
        }
        this.lastMarker = reply.id;
        return reply.text.trim();
    }

    async setCharacter(name: string): Promise<void> {
        const names = await this.page.listCharacters();
        if (!names.some((candidate) => candidate.trim() === name)) {
            await this.page.dismissCharacterList();
            throw new BridgeError("CHARACTER_NOT_FOUND", `Character \`${name}\` not found in the web UI.`);
        }
        await this.page.openCharacter(name);
        await this.sleep(this.characterSettleMs);
        // a character switch loads another chat log
        await this.refreshMarker();
    }

    async setPersona(name: string): Promise<void> {
        await this.requireInput();
        const command = `/persona ${name}`;
        await this.page.typeAndSend(command);
        await this.sleep(this.personaSettleMs);
        if ((await this.page.readInput()) === command) {
            await this.page.clearInput();
        }
    }

    private async requireInput(): Promise<void> {
        if (!(await this.page.hasInput())) {
            throw new BridgeError("ELEMENT_NOT_FOUND", `message input ${MESSAGE_INPUT} not found`);
        }
    }

    private async waitUntilIdle(): Promise<void> {
        const idle = await pollUntil(async () => ((await this.page.isGenerating()) ? null : true), {
            timeoutMs: this.idleTimeoutMs,
            intervalMs: this.pollIntervalMs,
            now: this.now,
            sleep: this.sleep,
        });
        if (!idle) {
            throw new BridgeError("TIMEOUT", "The web UI is still generating an earlier reply.");
        }
    }

    private async refreshMarker(): Promise<void> {
        const messages = await this.page.listMessages();
        this.lastMarker = messages.at(-1)?.id ?? null;
    }

    /** Newest non-user message after the marker, once generation has stopped. */
    private async findNewReply(): Promise<ChatMessageSnapshot | null> {
        if (await this.page.isGenerating()) return null;
        const messages = await this.page.listMessages();
        // marker gone (chat reloaded) means everything on the page counts as new
        const start = this.lastMarker === null ? 0 : messages.findIndex((m) => m.id === this.lastMarker) + 1;
        const fresh = messages.slice(start).filter((m) => !m.is_user && m.text.trim().length > 0);
        return fresh.at(-1) ?? null;
    }
}
