import { BridgeError } from "../../lib/errors";
import type { Event } from "../event";
import type { BridgeStatus, Outbound } from "../outbound";
import { SessionContext, type OpenSession } from "../session";
import type { WebUiAdapter } from "../web_ui/types";

export const CHANNEL_ID = "1000";
export const OTHER_CHANNEL_ID = "2000";

export function makeEvent(text: string, overrides: { channelId?: string; userId?: string; username?: string; isBot?: boolean } = {}): Event {
  return {
    trace_id: `trace-${Date.now()}-${Math.random()}`,
    channel: "discord",
    sender: {
      id: overrides.userId ?? "42",
      display: overrides.username ?? "alice",
      username: overrides.username ?? "alice",
      is_bot: overrides.isBot ?? false,
    },
    conversation: { thread_id: overrides.channelId ?? CHANNEL_ID },
    message: { id: `msg-${Math.random()}`, text },
    received_at: new Date().toISOString(),
  };
}

/** Scripted WebUiAdapter that records every call in order. */
export class FakeAdapter implements WebUiAdapter {
  readonly calls: string[] = [];
  characters = new Set(["Assistant", "Seraphina"]);
  replies: string[] = ["hello from the web UI"];
  submitError: Error | null = null;
  personaError: Error | null = null;
  characterError: Error | null = null;
  /** When set, awaitResponse waits for this promise before replying. */
  hold: Promise<void> | null = null;
  inFlight = 0;
  maxInFlight = 0;

  async submit(text: string): Promise<void> {
    this.calls.push(`submit:${text}`);
    if (this.submitError) throw this.submitError;
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
  }

  async awaitResponse(timeoutSeconds: number): Promise<string> {
    this.calls.push(`await:${timeoutSeconds}`);
    try {
      if (this.hold) await this.hold;
      const reply = this.replies.shift();
      if (reply === undefined) {
        throw new BridgeError("TIMEOUT", `No reply from the web UI within ${timeoutSeconds}s.`);
      }
      return reply;
    } finally {
      this.inFlight -= 1;
    }
  }

  async setCharacter(name: string): Promise<void> {
    this.calls.push(`character:${name}`);
    if (this.characterError) throw this.characterError;
    if (!this.characters.has(name)) {
      throw new BridgeError("CHARACTER_NOT_FOUND", `Character \`${name}\` not found in the web UI.`);
    }
  }

  async setPersona(name: string): Promise<void> {
    this.calls.push(`persona:${name}`);
    if (this.personaError) throw this.personaError;
  }
}

export class RecordingOutbound implements Outbound {
  readonly replies: Array<{ threadId: string; text: string }> = [];
  readonly statuses: BridgeStatus[] = [];
  typingStarted = 0;
  typingStopped = 0;

  async sendReply(threadId: string, text: string): Promise<void> {
    this.replies.push({ threadId, text });
  }

  startTyping(): () => void {
    this.typingStarted += 1;
    return () => {
      this.typingStopped += 1;
    };
  }

  async setStatus(status: BridgeStatus): Promise<void> {
    this.statuses.push(status);
  }
}

/** Opener that hands out a fresh FakeAdapter per call and counts closes. */
export class FakeOpener {
  readonly opened: FakeAdapter[] = [];
  closes = 0;
  failNext = false;
  configure: (adapter: FakeAdapter) => void = () => {};

  open = async (): Promise<OpenSession> => {
    if (this.failNext) {
      this.failNext = false;
      throw new BridgeError("BROWSER_LAUNCH_FAILED", "chrome launch failed: no browser");
    }
    const adapter = new FakeAdapter();
    this.configure(adapter);
    this.opened.push(adapter);
    let closed = false;
    return {
      adapter,
      close: async () => {
        if (closed) throw new Error("session closed twice");
        closed = true;
        this.closes += 1;
      },
    };
  };

  get latest(): FakeAdapter {
    const adapter = this.opened.at(-1);
    if (!adapter) throw new Error("no session opened yet");
    return adapter;
  }
}

export async function connectedSession(opener: FakeOpener, personaMapping: Record<string, string> = {}): Promise<SessionContext> {
  const session = new SessionContext({
    open: opener.open,
    initialCharacter: "Assistant",
    personaMapping,
    reconnectDelayMs: 0,
  });
  await session.connect();
  return session;
}
